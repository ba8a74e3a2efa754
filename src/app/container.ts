import type { AxiosInstance } from "axios";
import { getDb, type AppDatabase } from "../db/client";
import { AccountsRepository } from "../db/repositories/accounts.repo";
import { GroupsRepository } from "../db/repositories/groups.repo";
import { PostsRepository } from "../db/repositories/posts.repo";
import { CommentsRepository } from "../db/repositories/comments.repo";
import { UserProfilesRepository } from "../db/repositories/user-profiles.repo";
import { FinancialAnalysesRepository } from "../db/repositories/financial-analyses.repo";
import { AppConfigRepository } from "../db/repositories/app-config.repo";
import { SettingsStore } from "../core/settings";
import type { Sleep } from "../core/retry";
import { CredentialStore } from "../services/credential-store";
import { SessionManager } from "../services/session-manager";
import { PlaywrightDriver } from "../services/browser/playwright-driver";
import type { BrowserDriver } from "../services/browser/types";
import { TerminalConfirmation, type ConfirmationPort } from "../services/confirmation";
import { GraphClient } from "../platforms/facebook/graph-client";
import type { LLMCallOptions, LLMClient, LLMCompletion, LLMPrompt } from "../llm/contracts";
import { OpenRouterClient } from "../llm/openrouter-client";
import { ScrapeOrchestrator } from "../orchestration/scrape-orchestrator";
import { AnalysisPipeline } from "../orchestration/analysis-pipeline";
import { JobQueue } from "../orchestration/job-queue";

/** Defers building the API client until the first call, so commands that never analyze need no key. */
class LazyLLMClient implements LLMClient {
  private client: LLMClient | null = null;

  complete(prompt: LLMPrompt, options?: LLMCallOptions): Promise<LLMCompletion> {
    if (!this.client) {
      this.client = new OpenRouterClient();
    }
    return this.client.complete(prompt, options);
  }
}

export interface ContainerOverrides {
  db?: AppDatabase;
  browser?: BrowserDriver;
  llm?: LLMClient;
  http?: AxiosInstance;
  confirmation?: ConfirmationPort;
  sleep?: Sleep;
  environment?: NodeJS.ProcessEnv;
}

export interface Container {
  db: AppDatabase;
  settings: SettingsStore;
  repos: {
    accounts: AccountsRepository;
    groups: GroupsRepository;
    posts: PostsRepository;
    comments: CommentsRepository;
    profiles: UserProfilesRepository;
    analyses: FinancialAnalysesRepository;
    appConfig: AppConfigRepository;
  };
  credentials: CredentialStore;
  sessions: SessionManager;
  graph: GraphClient;
  scraper: ScrapeOrchestrator;
  analysis: AnalysisPipeline;
  jobs: JobQueue;
}

export async function buildContainer(overrides: ContainerOverrides = {}): Promise<Container> {
  const db = overrides.db ?? getDb();

  const repos = {
    accounts: new AccountsRepository(db),
    groups: new GroupsRepository(db),
    posts: new PostsRepository(db),
    comments: new CommentsRepository(db),
    profiles: new UserProfilesRepository(db),
    analyses: new FinancialAnalysesRepository(db),
    appConfig: new AppConfigRepository(db),
  };

  const settings = new SettingsStore(repos.appConfig, overrides.environment);
  await settings.load();

  const credentials = new CredentialStore(repos.accounts);
  const sessions = new SessionManager({
    credentials,
    browser: overrides.browser ?? new PlaywrightDriver(),
    settings,
    http: overrides.http,
    sleep: overrides.sleep,
  });
  const graph = new GraphClient(() => settings.current.graphBaseUrl, overrides.http);

  const scraper = new ScrapeOrchestrator({
    accounts: repos.accounts,
    groups: repos.groups,
    posts: repos.posts,
    comments: repos.comments,
    profiles: repos.profiles,
    sessions,
    graph,
    confirmation: overrides.confirmation ?? new TerminalConfirmation(),
    settings,
    sleep: overrides.sleep,
  });

  const analysis = new AnalysisPipeline({
    profiles: repos.profiles,
    analyses: repos.analyses,
    llm: overrides.llm ?? new LazyLLMClient(),
    settings,
    sleep: overrides.sleep,
  });

  return { db, settings, repos, credentials, sessions, graph, scraper, analysis, jobs: new JobQueue() };
}
