/**
 * Command-line program
 * @module cli/program
 */

import { Command, CommanderError } from 'commander';
import { Connection } from '@solana/web3.js';
import { RandomSource, formatSol } from '../amount.js';
import { SelfTransferClient, TransferPlan } from '../client.js';
import {
  DEFAULT_CONFIG_FILE,
  TransferConfig,
  resolveTransferConfig,
} from '../config.js';
import { errorMessage } from '../errors.js';
import { LedgerClient } from '../ledger/types.js';
import { RpcLedgerClient } from '../ledger/rpc.js';
import { TransferSigner } from '../signer/types.js';
import { resolveSigner } from '../signer/resolve.js';
import { Logger, LogLevel } from '../utils/logger.js';

export const VERSION = '0.1.0';

/** Exit status when invoked without arguments */
export const EXIT_USAGE = 2;

/**
 * Process-level collaborators, swappable in tests
 */
export interface CliDeps {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  resolveSigner: (reference: string, env: NodeJS.ProcessEnv) => Promise<TransferSigner>;
  createLedger: (config: TransferConfig, logger: Logger) => LedgerClient;
  random?: RandomSource;
}

type ParsedOptions = {
  config?: string;
  keypair?: string;
  url?: string;
  verbose?: boolean;
};

export function defaultDeps(): CliDeps {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    resolveSigner,
    createLedger: (config, logger) =>
      new RpcLedgerClient(
        new Connection(config.url, {
          commitment: config.commitment,
          wsEndpoint: config.websocketUrl,
        }),
        {
          commitment: config.commitment,
          logger: logger.child('rpc'),
        }
      ),
  };
}

function createProgram(deps: CliDeps): Command {
  return new Command()
    .name('transfer-with')
    .description('Transfer a random amount to yourself, referencing extra read-only accounts')
    .version(VERSION)
    .option('-C, --config <PATH>', 'Configuration file to use', DEFAULT_CONFIG_FILE)
    .option('--keypair <KEYPAIR>', 'Filepath or remote signer reference [default: client keypair]')
    .option('-v, --verbose', 'Show additional information')
    .option(
      '-u, --url <URL>',
      'JSON RPC URL for the cluster [default: value from configuration file]'
    )
    .argument('[ADDRESS...]', 'Extra addresses to append')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text),
      writeErr: (text) => deps.stderr(text),
    });
}

function formatPlan(plan: TransferPlan): string {
  const extras = plan.extraAddresses.map((key) => key.toBase58()).join(', ');
  return (
    `Fee payer: ${plan.feePayer.toBase58()}, Amount: ${formatSol(plan.lamports)}\n` +
    `Extra addresses: [${extras}]\n`
  );
}

/**
 * Run the tool against `argv` (user arguments only) and return the exit code
 */
export async function run(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const program = createProgram(deps);

  if (argv.length === 0) {
    program.outputHelp({ error: true });
    return EXIT_USAGE;
  }

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<ParsedOptions>();
  const logger = new Logger(options.verbose ? LogLevel.DEBUG : LogLevel.WARN);

  try {
    const config = await resolveTransferConfig(
      {
        config: options.config,
        keypair: options.keypair,
        url: options.url,
        verbose: options.verbose,
        extraAddresses: program.args,
      },
      logger.child('config')
    );

    const signer = await deps.resolveSigner(config.keypair, deps.env);

    if (config.verbose) {
      deps.stdout(`JSON RPC URL: ${config.url}\n`);
    }

    const client = new SelfTransferClient({
      ledger: deps.createLedger(config, logger),
      signer,
      random: deps.random,
      logger: logger.child('transfer'),
    });

    const result = await client.transfer({
      extraAddresses: config.extraAddresses,
      onPlan: config.verbose ? (plan) => deps.stdout(formatPlan(plan)) : undefined,
    });

    deps.stdout(`Signature: ${result.signature}\n`);
    return 0;
  } catch (error) {
    deps.stderr(`error: ${errorMessage(error)}\n`);
    return 1;
  }
}
