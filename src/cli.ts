/**
 * gps-cluster-sort CLI
 *
 * Reads a GPS list, removes duplicates, groups resources under clusters,
 * normalizes resource labels and writes the sorted list to a new file.
 *
 * Usage:
 *   gps-cluster-sort <input> <output> [options]
 */

import { Command, CommanderError, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import ora, { type Ora } from 'ora';

import { ASSIGNMENT_POLICIES, type AssignmentPolicy } from './clusters.js';
import { loadGameConfig } from './config.js';
import { createTerminalOracle, type DecisionOracle, type TerminalOracle } from './oracle.js';
import { parseCoordinateFile } from './parser.js';
import { runPipeline } from './pipeline.js';

// ============================================================================
// VERSION
// ============================================================================

const VERSION = '0.1.0';

// ============================================================================
// I/O
// ============================================================================

export interface CliIO {
  /** Defaults to a terminal prompt on stdin/stdout */
  oracle?: DecisionOracle;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  now?: () => Date;
  randomInt?: (max: number) => number;
}

export type ResolvedIO = Required<Omit<CliIO, 'oracle' | 'randomInt'>> & Pick<CliIO, 'oracle' | 'randomInt'>;

interface SortOptions {
  config?: string;
  zones: boolean;
  policy: AssignmentPolicy;
  quiet?: boolean;
}

/**
 * Bad invocation: reported together with the usage text.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ============================================================================
// SORT COMMAND
// ============================================================================

async function sortCommand(
  input: string,
  output: string,
  options: SortOptions,
  io: ResolvedIO
): Promise<void> {
  const inputPath = path.resolve(input);
  const outputPath = path.resolve(output);

  if (!fs.existsSync(inputPath) || !fs.statSync(inputPath).isFile()) {
    throw new UsageError(`Input file does not exist: ${input}`);
  }
  if (fs.existsSync(outputPath)) {
    throw new UsageError(`Output file already exists: ${output}`);
  }

  const config = loadGameConfig(options.config ? path.resolve(options.config) : undefined);
  const warn = (message: string): void => io.stderr(`${message}\n`);

  let spinner: Ora | null = options.quiet ? null : ora('Reading coordinates...').start();
  let ownOracle: TerminalOracle | null = null;

  try {
    const parsed = await parseCoordinateFile(inputPath);

    if (spinner) {
      if (parsed.errors.length > 0) {
        spinner.warn(`Read ${parsed.records.length} coordinates, skipped ${parsed.errors.length} lines`);
      } else {
        spinner.succeed(`Read ${parsed.records.length} coordinates`);
      }
      // Prompts follow: the spinner must be stopped before stdin is read
      spinner = null;
    }
    for (const err of parsed.errors) {
      warn(`  Line ${err.line}: ${err.error}`);
    }

    let oracle: DecisionOracle;
    if (io.oracle) {
      oracle = io.oracle;
    } else {
      ownOracle = createTerminalOracle();
      oracle = ownOracle;
    }

    const result = await runPipeline(parsed.records, config, oracle, {
      zoning: options.zones,
      policy: options.policy,
      date: io.now(),
      randomInt: io.randomInt,
      warn,
    });

    fs.writeFileSync(outputPath, result.output, { flag: 'wx' });

    if (!options.quiet) {
      const { stats } = result;
      io.stdout(
        `Removed ${stats.clusterDuplicates} duplicate clusters and ${stats.resourceDuplicates} duplicate resources, ` +
        `created ${stats.clustersCreated} clusters\n`
      );
      if (stats.unassigned > 0) {
        io.stdout(`Left out ${stats.unassigned} resources with no cluster in range\n`);
      }
    }
    io.stdout(`Coordinates output to ${output}\n`);
  } catch (error) {
    if (spinner) spinner.fail('Sort failed');
    throw error;
  } finally {
    ownOracle?.close();
  }
}

// ============================================================================
// MAIN PROGRAM
// ============================================================================

export function createProgram(io: ResolvedIO): Command {
  return new Command()
    .name('gps-cluster-sort')
    .description('Deduplicate, cluster and normalize a game GPS marker list')
    .version(VERSION)
    .argument('<input>', 'GPS list to read')
    .argument('<output>', 'File to write (must not exist)')
    .option('-c, --config <file>', 'Zone and ore configuration (JSON)')
    .option('--no-zones', 'Skip zone classification and section headers')
    .addOption(
      new Option('--policy <policy>', 'What to do with resources no cluster is near')
        .choices(ASSIGNMENT_POLICIES)
        .default('synthesize')
    )
    .option('-q, --quiet', 'Suppress progress output')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    })
    .action(async (input: string, output: string, options: SortOptions) => {
      await sortCommand(input, output, options, io);
    });
}

/**
 * Run the CLI and resolve to the process exit code.
 *
 * @param argv - Full `process.argv`-style array (node path, script path, args)
 */
export async function runCli(argv: string[], io: CliIO = {}): Promise<number> {
  const resolved: ResolvedIO = {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
    now: () => new Date(),
    ...io,
  };
  const program = createProgram(resolved);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    resolved.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    if (error instanceof UsageError) {
      resolved.stderr(program.helpInformation());
    }
    return 1;
  }
}
