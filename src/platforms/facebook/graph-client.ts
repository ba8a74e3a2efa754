import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { UpstreamError } from "../../core/errors";
import { logger } from "../../core/logger";

const PagingSchema = z.object({
  cursors: z.object({ before: z.string().optional(), after: z.string().optional() }).optional(),
  next: z.string().optional(),
  previous: z.string().optional(),
});

export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    data: z.array(item),
    paging: PagingSchema.optional(),
  });
}

export const FeedItemSchema = z.object({
  id: z.string(),
  message: z.string().optional(),
  created_time: z.string().optional(),
  updated_time: z.string().optional(),
});

export const CommentItemSchema = z.object({
  id: z.string(),
  message: z.string().optional(),
  created_time: z.string().optional(),
  from: z.object({ id: z.string(), name: z.string().optional() }).optional(),
});

const FeedPageSchema = pageSchema(FeedItemSchema);
const CommentPageSchema = pageSchema(CommentItemSchema);

export type FeedItem = z.infer<typeof FeedItemSchema>;
export type CommentItem = z.infer<typeof CommentItemSchema>;
export type FeedPage = z.infer<typeof FeedPageSchema>;
export type CommentPage = z.infer<typeof CommentPageSchema>;

const GraphErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.number().optional(),
    type: z.string().optional(),
  }),
});

export interface ListOptions {
  limit: number;
  order?: "chronological" | "reverse_chronological";
}

export type QueryParams = Record<string, string | number>;

export class GraphClient {
  constructor(
    private readonly baseUrl: () => string,
    private readonly http: AxiosInstance = axios.create({ timeout: 30000 })
  ) {}

  async query<S extends z.ZodTypeAny>(
    path: string,
    params: QueryParams,
    accessToken: string,
    schema: S
  ): Promise<z.infer<S>> {
    const url = `${this.baseUrl().replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        params: { ...params, access_token: accessToken },
      });
      body = response.data;
    } catch (error) {
      throw toUpstreamError(path, error);
    }

    const remoteError = GraphErrorSchema.safeParse(body);
    if (remoteError.success) {
      const { message, code } = remoteError.data.error;
      logger.warn({ path, code }, "Graph API returned an error");
      throw new UpstreamError(`Graph API error: ${message}`, `graph_${code ?? "error"}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ path, issues: parsed.error.issues.length }, "Graph API response failed validation");
      throw new UpstreamError("Graph API returned an unexpected payload", "graph_invalid_payload");
    }
    return parsed.data;
  }

  async fetchGroupFeed(groupExternalId: string, options: ListOptions, accessToken: string): Promise<FeedPage> {
    return this.query(
      `${groupExternalId}/feed`,
      { limit: options.limit, order: options.order ?? "chronological" },
      accessToken,
      FeedPageSchema
    );
  }

  async fetchPostComments(postExternalId: string, options: ListOptions, accessToken: string): Promise<CommentPage> {
    return this.query(
      `${postExternalId}/comments`,
      { limit: options.limit, order: options.order ?? "chronological" },
      accessToken,
      CommentPageSchema
    );
  }
}

function toUpstreamError(path: string, error: unknown): UpstreamError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const remote = GraphErrorSchema.safeParse(error.response?.data);
    const detail = remote.success ? remote.data.error.message : error.message;
    const code = remote.success && remote.data.error.code !== undefined ? `graph_${remote.data.error.code}` : `http_${status ?? "network"}`;
    logger.warn({ path, status, code }, "Graph API request failed");
    return new UpstreamError(`Graph API request failed: ${detail}`, code, { cause: error });
  }
  return new UpstreamError("Graph API request failed", "graph_unknown", { cause: error });
}
