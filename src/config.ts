/**
 * Configuration resolution
 * @module config
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { PublicKey } from '@solana/web3.js';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { Logger } from './utils/logger.js';
import { expandHome } from './utils/paths.js';

export const DEFAULT_CONFIG_FILE = join(homedir(), '.config', 'solana', 'cli', 'config.yml');

export const DEFAULT_RPC_URL = 'https://api.mainnet-beta.solana.com';

export const DEFAULT_KEYPAIR_PATH = join(homedir(), '.config', 'solana', 'id.json');

const MONIKERS = new Map<string, string>([
  ['m', 'https://api.mainnet-beta.solana.com'],
  ['mainnet-beta', 'https://api.mainnet-beta.solana.com'],
  ['t', 'https://api.testnet.solana.com'],
  ['testnet', 'https://api.testnet.solana.com'],
  ['d', 'https://api.devnet.solana.com'],
  ['devnet', 'https://api.devnet.solana.com'],
  ['l', 'http://localhost:8899'],
  ['localhost', 'http://localhost:8899'],
]);

const CommitmentSchema = z.enum(['processed', 'confirmed', 'finalized']);

/**
 * Solana CLI config file (`config.yml`). Unknown keys are ignored.
 */
export const CliConfigFileSchema = z.object({
  json_rpc_url: z.string().min(1).default(DEFAULT_RPC_URL),
  websocket_url: z
    .string()
    .optional()
    .transform((value) => value || undefined),
  keypair_path: z.string().min(1).default(DEFAULT_KEYPAIR_PATH),
  commitment: CommitmentSchema.default('confirmed'),
});

export type CliConfigFile = z.infer<typeof CliConfigFileSchema>;

/**
 * Defaults used when no config file is given or it cannot be loaded
 */
export function defaultCliConfig(): CliConfigFile {
  return CliConfigFileSchema.parse({});
}

/**
 * Load a Solana CLI config file, falling back to defaults when it is
 * missing or unreadable.
 */
export async function loadCliConfig(
  path: string | undefined,
  logger: Logger = new Logger()
): Promise<CliConfigFile> {
  if (!path) {
    return defaultCliConfig();
  }

  try {
    const raw = await readFile(expandHome(path), 'utf8');
    const parsed = CliConfigFileSchema.safeParse(parseYaml(raw) ?? {});
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn(`Ignoring invalid config file ${path}: ${parsed.error.issues[0]?.message}`);
  } catch (error) {
    logger.debug(`No usable config file at ${path}`, error);
  }

  return defaultCliConfig();
}

/**
 * Map a cluster moniker to its public endpoint; other input is returned as is
 */
export function normalizeToUrlIfMoniker(urlOrMoniker: string): string {
  return MONIKERS.get(urlOrMoniker) ?? urlOrMoniker;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const HttpUrl = z.string().refine(isHttpUrl, {
  message: 'must be an http(s) URL or a cluster moniker',
});

const WsUrl = z.string().refine(
  (value) => {
    try {
      const { protocol } = new URL(value);
      return protocol === 'ws:' || protocol === 'wss:';
    } catch {
      return false;
    }
  },
  { message: 'must be a ws(s) URL' }
);

const Address = z.string().transform((value, ctx) => {
  try {
    return new PublicKey(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid address: ${value}` });
    return z.NEVER;
  }
});

/**
 * Options as collected from the command line
 */
export interface TransferOptionsInput {
  config?: string;
  keypair?: string;
  url?: string;
  verbose?: boolean;
  extraAddresses?: string[];
}

export const TransferConfigSchema = z.object({
  configFile: z.string().optional(),
  keypair: z.string().min(1, 'keypair reference is empty'),
  url: HttpUrl,
  /** Pubsub endpoint; derived from `url` when absent */
  websocketUrl: WsUrl.optional(),
  verbose: z.boolean(),
  extraAddresses: z.array(Address),
  commitment: CommitmentSchema,
});

/**
 * Fully resolved and validated run configuration
 */
export type TransferConfig = z.infer<typeof TransferConfigSchema>;

/**
 * Merge command-line options over the config file and validate the result.
 * The file's websocket URL only applies while its RPC URL does.
 *
 * Every problem is reported at once in a single ConfigError.
 */
export async function resolveTransferConfig(
  input: TransferOptionsInput,
  logger: Logger = new Logger()
): Promise<TransferConfig> {
  const file = await loadCliConfig(input.config, logger);

  const result = TransferConfigSchema.safeParse({
    configFile: input.config,
    keypair: input.keypair ?? file.keypair_path,
    url: normalizeToUrlIfMoniker(input.url ?? file.json_rpc_url),
    websocketUrl: input.url ? undefined : file.websocket_url,
    verbose: input.verbose ?? false,
    extraAddresses: input.extraAddresses ?? [],
    commitment: file.commitment,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`invalid options: ${issues.join('; ')}`, issues);
  }

  return result.data;
}
