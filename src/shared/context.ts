/**
 * Run context resolution
 * Turns the GitHub event context into the ref to check out and push to
 */

import { CheckoutError, ContextError } from './errors.js';

export type TriggerEvent = 'push' | 'pull_request';

export type RefType = 'branch' | 'tag';

// GitHub repository context
export interface RepoContext {
  owner: string;
  repo: string;
}

/**
 * Subset of the @actions/github context the pipeline reads
 */
export interface EventContext {
  eventName: string;
  ref: string;
  sha: string;
  actor: string;
  serverUrl?: string;
  repo: RepoContext;
  payload: Record<string, unknown>;
}

export interface RunContext {
  eventName: TriggerEvent;
  repo: RepoContext;
  ref: string;
  refType: RefType;
  sha: string;
  cloneRepo: RepoContext;
  isFork: boolean;
  pullRequestNumber?: number;
  actor: string;
  actorId?: string;
  serverUrl: string;
}

const DEFAULT_SERVER_URL = 'https://github.com';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readRecord(source: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = source[key];
  return isRecord(value) ? value : undefined;
}

/**
 * Parse "owner/repo" into a repo context
 */
export function parseFullName(fullName: string): RepoContext | undefined {
  const parts = fullName.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return undefined;
  }
  return { owner: parts[0], repo: parts[1] };
}

/**
 * Strip refs/heads/ or refs/tags/ from a fully qualified ref
 */
export function parseRef(ref: string): { name: string; type: RefType } {
  if (ref.startsWith('refs/heads/')) {
    return { name: ref.substring('refs/heads/'.length), type: 'branch' };
  }
  if (ref.startsWith('refs/tags/')) {
    return { name: ref.substring('refs/tags/'.length), type: 'tag' };
  }
  return { name: ref, type: 'branch' };
}

function readActorId(payload: Record<string, unknown>): string | undefined {
  const sender = readRecord(payload, 'sender');
  const id = sender?.id;
  if (typeof id === 'number' || (typeof id === 'string' && id.length > 0)) {
    return String(id);
  }
  return undefined;
}

function resolvePullRequest(ctx: EventContext, base: Omit<RunContext, 'ref' | 'refType' | 'sha' | 'cloneRepo' | 'isFork'>): RunContext {
  const pr = readRecord(ctx.payload, 'pull_request');
  const head = pr ? readRecord(pr, 'head') : undefined;
  const headRef = head ? readString(head, 'ref') : undefined;
  if (!pr || !head || !headRef) {
    throw new ContextError('pull_request payload has no head branch');
  }

  const headRepo = readRecord(head, 'repo');
  const headFullName = headRepo ? readString(headRepo, 'full_name') : undefined;
  const cloneRepo = (headFullName && parseFullName(headFullName)) || ctx.repo;
  const baseFullName = `${ctx.repo.owner}/${ctx.repo.repo}`;
  const isFork = headFullName !== undefined && headFullName.toLowerCase() !== baseFullName.toLowerCase();

  const number = pr.number;

  return {
    ...base,
    ref: headRef,
    refType: 'branch',
    sha: readString(head, 'sha') || ctx.sha,
    cloneRepo,
    isFork,
    pullRequestNumber: typeof number === 'number' ? number : undefined
  };
}

/**
 * Build the run context for a push or pull_request event
 * @throws ContextError for any other event
 * @throws CheckoutError when a push deleted the ref
 */
export function resolveRunContext(ctx: EventContext): RunContext {
  const base = {
    repo: ctx.repo,
    actor: ctx.actor,
    actorId: readActorId(ctx.payload),
    serverUrl: (ctx.serverUrl || DEFAULT_SERVER_URL).replace(/\/+$/, '')
  };

  switch (ctx.eventName) {
    case 'pull_request':
      return resolvePullRequest(ctx, { ...base, eventName: 'pull_request' });
    case 'push': {
      if (ctx.payload.deleted === true) {
        throw new CheckoutError(`Ref ${ctx.ref} was deleted by this push, nothing to check out`);
      }
      if (!ctx.ref) {
        throw new ContextError('push event has no ref');
      }
      const { name, type } = parseRef(ctx.ref);
      return {
        ...base,
        eventName: 'push',
        ref: name,
        refType: type,
        sha: ctx.sha,
        cloneRepo: ctx.repo,
        isFork: false
      };
    }
    default:
      throw new ContextError(`Unsupported event: ${ctx.eventName}`);
  }
}

/**
 * Clone URL for the repository the tree is fetched from
 */
export function getCloneUrl(context: RunContext): string {
  return `${context.serverUrl}/${context.cloneRepo.owner}/${context.cloneRepo.repo}.git`;
}
