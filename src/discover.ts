import { type JsonObject } from './envelope.js';
import { GatewayError } from './errors.js';
import { structuredLog } from './logger.js';
import { CLIENT_METADATA } from './upstream.js';
import { isRecord, sleep } from './utils.js';

/** The slice of the upstream client that tenant discovery needs. */
export interface DiscoveryClient {
  loadCodeAssist(projectId?: string): Promise<JsonObject>;
  onboardUser(request: JsonObject): Promise<JsonObject>;
}

export interface DiscoverOptions {
  pollIntervalMs?: number;
  /** Stop polling after this many attempts; unbounded when omitted. */
  maxPolls?: number;
}

export class DiscoveryError extends GatewayError {
  constructor(message: string) {
    super(message, 502, 'upstream_error');
  }
}

const DEFAULT_TIER = 'free-tier';
const DEFAULT_POLL_INTERVAL_MS = 2000;

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function defaultTierId(loaded: JsonObject): string {
  const tiers = loaded['allowedTiers'];
  if (Array.isArray(tiers)) {
    for (const tier of tiers) {
      if (isRecord(tier) && tier['isDefault'] === true) {
        const id = nonEmptyString(tier['id']);
        if (id) return id;
      }
    }
  }
  return DEFAULT_TIER;
}

function onboardedProjectId(operation: JsonObject): string | undefined {
  const response = operation['response'];
  if (!isRecord(response)) return undefined;
  const project = response['cloudaicompanionProject'];
  return isRecord(project) ? nonEmptyString(project['id']) : undefined;
}

/**
 * Resolves the tenant (project) id that generation requests are billed to.
 * An explicit override wins; otherwise the account is asked, and an account
 * without a project is onboarded onto its default tier.
 */
export async function discoverTenant(
  client: DiscoveryClient,
  envOverride: string | undefined,
  options: DiscoverOptions = {}
): Promise<string> {
  const override = envOverride?.trim();
  if (override) {
    structuredLog('info', 'Discovery', `Using configured project ${override}`);
    return override;
  }

  const loaded = await client.loadCodeAssist();
  const existing = nonEmptyString(loaded['cloudaicompanionProject']);

  // accounts outside a managed organisation always get their project back as-is
  if (loaded['gcpManaged'] !== true) {
    if (existing) structuredLog('info', 'Discovery', `Discovered project ${existing}`);
    return existing ?? '';
  }
  if (existing) {
    structuredLog('info', 'Discovery', `Discovered project ${existing}`);
    return existing;
  }

  const tierId = defaultTierId(loaded);
  structuredLog('info', 'Discovery', `No project assigned, onboarding onto tier ${tierId}`);
  const request: JsonObject = {
    tierId,
    cloudaicompanionProject: 'default',
    metadata: { ...CLIENT_METADATA, duetProject: 'default' },
  };

  const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  let operation = await client.onboardUser(request);
  let polls = 1;
  while (operation['done'] !== true) {
    if (options.maxPolls !== undefined && polls >= options.maxPolls) {
      throw new DiscoveryError(`onboarding did not complete after ${String(polls)} attempts`);
    }
    await sleep(interval);
    operation = await client.onboardUser(request);
    polls++;
  }

  const projectId = onboardedProjectId(operation);
  if (!projectId) throw new DiscoveryError('onboarding completed but no project ID found');
  structuredLog('info', 'Discovery', `Onboarded onto project ${projectId}`);
  return projectId;
}
