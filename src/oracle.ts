/**
 * Decision Oracle
 *
 * The human in the loop: picks which of a group of duplicate markers to keep
 * and supplies replacement labels for labels that do not normalize. The
 * terminal binding blocks until the user answers; the scripted binding
 * replays canned answers.
 */

import * as readline from 'readline/promises';

export interface DuplicateCandidate {
  /** Display name of the marker */
  name: string;
  /** Rounded distance to the group's anchor marker, in meters */
  distance: number;
}

export interface DecisionOracle {
  /**
   * Choose which member of a duplicate group survives.
   *
   * @returns 1-based index into `group`
   */
  chooseSurvivor(group: readonly DuplicateCandidate[]): Promise<number>;

  /** Supply a new label for one that failed to normalize */
  supplyReplacementLabel(invalidLabel: string): Promise<string>;
}

// ============================================================================
// TERMINAL ORACLE
// ============================================================================

export interface TerminalOracle extends DecisionOracle {
  close(): void;
}

/**
 * Parse a typed choice. Anything but a plain positive integer gives NaN, which
 * callers reject as out of range.
 */
export function parseChoice(answer: string): number {
  const trimmed = answer.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
}

export function createTerminalOracle(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalOracle {
  const rl = readline.createInterface({ input, output });
  const closed = new AbortController();
  rl.once('close', () => closed.abort());

  let lastGroup: readonly DuplicateCandidate[] | null = null;

  async function ask(query: string): Promise<string> {
    if (closed.signal.aborted) {
      throw new Error('Input closed while waiting for a response');
    }
    try {
      return await rl.question(query, { signal: closed.signal });
    } catch (error) {
      if (closed.signal.aborted) {
        throw new Error('Input closed while waiting for a response');
      }
      throw error;
    }
  }

  return {
    async chooseSurvivor(group) {
      // The resolver asks again with the same group after an invalid answer
      if (group !== lastGroup) {
        lastGroup = group;
        output.write('Duplicate coordinates found!\n\n');
        group.forEach((candidate, i) => {
          output.write(`\t${i + 1}) ${candidate.name} (${candidate.distance}m)\n`);
        });
        output.write('\n');
      }
      return parseChoice(await ask('Choose which coordinate to keep: '));
    },

    async supplyReplacementLabel() {
      return (await ask('Enter a new name: ')).trim();
    },

    close() {
      rl.close();
    },
  };
}

// ============================================================================
// SCRIPTED ORACLE
// ============================================================================

export interface OracleScript {
  /** Answers for `chooseSurvivor`, in call order */
  choices?: number[];
  /** Answers for `supplyReplacementLabel`, in call order */
  labels?: string[];
}

export interface ScriptedOracle extends DecisionOracle {
  /** Every group passed to `chooseSurvivor`, in call order */
  readonly survivorRequests: DuplicateCandidate[][];
  /** Every label passed to `supplyReplacementLabel`, in call order */
  readonly labelRequests: string[];
}

/**
 * Oracle that answers from a fixed script and throws once the script runs out.
 */
export function createScriptedOracle(script: OracleScript = {}): ScriptedOracle {
  const choices = [...(script.choices ?? [])];
  const labels = [...(script.labels ?? [])];
  const survivorRequests: DuplicateCandidate[][] = [];
  const labelRequests: string[] = [];

  return {
    survivorRequests,
    labelRequests,

    async chooseSurvivor(group) {
      survivorRequests.push(group.map(candidate => ({ ...candidate })));
      const choice = choices.shift();
      if (choice === undefined) {
        throw new Error(`No scripted choice left for group: ${group.map(c => c.name).join(', ')}`);
      }
      return choice;
    },

    async supplyReplacementLabel(invalidLabel) {
      labelRequests.push(invalidLabel);
      const label = labels.shift();
      if (label === undefined) {
        throw new Error(`No scripted label left for: ${invalidLabel}`);
      }
      return label;
    },
  };
}
