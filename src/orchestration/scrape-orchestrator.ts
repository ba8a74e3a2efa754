import type { Account, Comment, Group, NewComment, NewPost, Post, UserProfile } from "../db/schema";
import type { AccountsRepository } from "../db/repositories/accounts.repo";
import type { GroupsRepository } from "../db/repositories/groups.repo";
import type { PostsRepository } from "../db/repositories/posts.repo";
import type { CommentsRepository } from "../db/repositories/comments.repo";
import type { UserProfilesRepository } from "../db/repositories/user-profiles.repo";
import type { GraphClient } from "../platforms/facebook/graph-client";
import type { SessionManager, SettingsView } from "../services/session-manager";
import type { ConfirmationPort } from "../services/confirmation";
import { closeSessionSafely, type BrowserSession } from "../services/browser/types";
import { detectAccessWall, extractProfileFields } from "../platforms/facebook/profile-extractors";
import {
  extractFacebookId,
  graphTimeToUnix,
  groupUrlForId,
  postIdFromGraphId,
  profileUrlForId,
} from "../platforms/facebook/urls";
import { GroupLinkError, NotFoundError, PreconditionError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import { sleep as defaultSleep, unixNow, type Sleep } from "../core/retry";

export interface ScrapeOrchestratorDeps {
  accounts: AccountsRepository;
  groups: GroupsRepository;
  posts: PostsRepository;
  comments: CommentsRepository;
  profiles: UserProfilesRepository;
  sessions: SessionManager;
  graph: GraphClient;
  confirmation: ConfirmationPort;
  settings: SettingsView;
  sleep?: Sleep;
}

export class ScrapeOrchestrator {
  private readonly sleep: Sleep;

  constructor(private readonly deps: ScrapeOrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Loads an account for a scraping entry point, rejecting unknown or blocked ones. */
  async requireActiveAccount(accountId: number): Promise<Account> {
    const account = await this.deps.accounts.findById(accountId);
    if (!account) {
      throw new NotFoundError(`Account ${accountId} not found`);
    }
    if (account.isBlocked) {
      throw new PreconditionError(`Account ${accountId} is blocked`, "account_blocked");
    }
    return account;
  }

  async linkGroup(account: Account, externalGroupId: string, groupName: string, isJoined = false): Promise<Group> {
    try {
      return this.deps.groups.linkToAccount(account.id, externalGroupId, groupName, isJoined);
    } catch (error) {
      logger.error({ accountId: account.id, externalGroupId, err: error }, "Failed to link group");
      throw new GroupLinkError(`Failed to link group ${externalGroupId}`, { cause: error });
    }
  }

  /**
   * Opens the group page for the operator, waits until every tab is closed,
   * then asks whether the join went through.
   */
  async joinGroup(accountId: number, groupId: number): Promise<boolean> {
    const account = await this.requireActiveAccount(accountId);
    const group = await this.deps.groups.findById(groupId);
    if (!group) {
      throw new NotFoundError(`Group ${groupId} not found`);
    }

    const { loginPollIntervalMs, loginTimeoutSeconds } = this.deps.settings.current;
    const maxPolls = Math.max(1, Math.ceil((loginTimeoutSeconds * 1000) / loginPollIntervalMs));

    const session = await this.deps.sessions.acquireSession(account, { headless: false });
    try {
      await session.goto(groupUrlForId(group.externalId));
      for (let poll = 0; poll < maxPolls && session.openTabCount() > 0; poll++) {
        await this.sleep(loginPollIntervalMs);
      }
    } finally {
      await closeSessionSafely(session);
    }

    const joined = await this.deps.confirmation.ask("Status Confirmation", "Did you join the group successfully?");
    if (joined) {
      await this.deps.groups.update(group.id, { isJoined: true, accountId: account.id });
      logger.info({ accountId, groupId }, "Group marked as joined");
    }
    return joined;
  }

  async scanGroup(externalGroupId: string): Promise<Post[]> {
    const found = await this.deps.groups.findByExternalIdWithOwner(externalGroupId);
    if (!found) {
      throw new NotFoundError(`Group ${externalGroupId} not found`);
    }
    const owner = this.requireUsableOwner(found.owner, `group ${externalGroupId}`);
    const token = await this.tokenFor(owner);

    const page = await this.deps.graph.fetchGroupFeed(
      externalGroupId,
      { limit: this.deps.settings.current.postFetchLimit, order: "chronological" },
      token
    );

    const items: NewPost[] = page.data.map((item) => ({
      externalId: postIdFromGraphId(item.id),
      groupId: found.group.id,
      content: item.message ?? "",
      createdAt: graphTimeToUnix(item.created_time ?? item.updated_time),
    }));

    const saved = await this.deps.posts.upsertMany(items);
    logger.info({ externalGroupId, accountId: owner.id, posts: saved.length }, "Group scanned");
    return saved;
  }

  async scanPost(externalPostId: string): Promise<Comment[]> {
    const context = await this.deps.posts.findContextByExternalId(externalPostId);
    if (!context) {
      throw new NotFoundError(`Post ${externalPostId} not found`);
    }
    const owner = this.requireUsableOwner(context.owner, `group of post ${externalPostId}`);
    const token = await this.tokenFor(owner);

    const page = await this.deps.graph.fetchPostComments(
      externalPostId,
      { limit: this.deps.settings.current.commentFetchLimit, order: "chronological" },
      token
    );

    const items: NewComment[] = [];
    for (const item of page.data) {
      let authorProfileId: number | null = null;
      if (item.from) {
        const author = await this.deps.profiles.findOrCreateStub(
          item.from.id,
          profileUrlForId(item.from.id),
          owner.id,
          item.from.name ?? null
        );
        authorProfileId = author.id;
      }
      items.push({
        externalId: item.id,
        postId: context.post.id,
        authorProfileId,
        content: item.message ?? "",
        createdAt: graphTimeToUnix(item.created_time),
      });
    }

    const saved = await this.deps.comments.upsertMany(items);
    await this.deps.posts.markAnalyzed(context.post.id);
    logger.info({ externalPostId, accountId: owner.id, comments: saved.length }, "Post scanned");
    return saved;
  }

  /**
   * Returns the cached profile while it is fresh, otherwise scrapes it.
   * Never throws; every failure is logged and returns null.
   */
  async scrapeProfile(url: string, account: Account, forceRefresh = false): Promise<UserProfile | null> {
    const facebookId = extractFacebookId(url);
    if (!facebookId) {
      logger.warn({ url }, "Not a profile URL");
      return null;
    }

    if (!forceRefresh) {
      const cached = await this.deps.profiles.findByFacebookId(facebookId);
      if (cached && this.isFresh(cached)) {
        logger.debug({ profileId: cached.id }, "Profile is fresh; using cached copy");
        return cached;
      }
    }

    let session: BrowserSession | null = null;
    try {
      session = await this.deps.sessions.acquireSession(account);
      await session.goto(url);
      await session.wait(this.deps.settings.current.pageSettleMs);

      const wall = detectAccessWall(await session.pageText());
      if (wall) {
        logger.warn({ accountId: account.id, facebookId, marker: wall }, "Profile page is behind an access wall");
        return null;
      }

      const fields = await extractProfileFields(session);
      if (Object.keys(fields).length === 0) {
        logger.warn({ accountId: account.id, facebookId }, "No profile fields found");
        return null;
      }

      const profile = await this.deps.profiles.upsertScraped(facebookId, profileUrlForId(facebookId), account.id, fields);
      logger.info({ accountId: account.id, profileId: profile.id }, "Profile scraped");
      return profile;
    } catch (error) {
      logger.warn({ accountId: account.id, facebookId, err: errorMessage(error) }, "Profile scrape failed");
      return null;
    } finally {
      await closeSessionSafely(session);
    }
  }

  /** Scrapes in input order with a pause between URLs. Failed URLs are left out of the result. */
  async batchScrapeProfiles(urls: string[], account: Account, delaySeconds: number): Promise<UserProfile[]> {
    const results: UserProfile[] = [];
    for (const [index, url] of urls.entries()) {
      const profile = await this.scrapeProfile(url, account);
      if (profile) results.push(profile);
      if (index < urls.length - 1) {
        await this.sleep(delaySeconds * 1000);
      }
    }
    logger.info({ accountId: account.id, requested: urls.length, scraped: results.length }, "Bulk scrape finished");
    return results;
  }

  private isFresh(profile: UserProfile): boolean {
    if (profile.lastScraped === null) return false;
    const windowSeconds = this.deps.settings.current.profileStaleHours * 3600;
    return unixNow() - profile.lastScraped <= windowSeconds;
  }

  private requireUsableOwner(owner: Account | null, what: string): Account {
    if (!owner) {
      throw new PreconditionError(`No account is linked to ${what}`, "no_owner");
    }
    if (owner.isBlocked) {
      throw new PreconditionError(`Account ${owner.id} linked to ${what} is blocked`, "account_blocked");
    }
    return owner;
  }

  private async tokenFor(owner: Account): Promise<string> {
    if (owner.accessToken) return owner.accessToken;
    const derived = await this.deps.sessions.deriveAccessToken(owner);
    if (!derived) {
      throw new PreconditionError(`Account ${owner.id} has no access token`, "no_access_token");
    }
    return derived;
  }
}
