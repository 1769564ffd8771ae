import readline from 'readline';
import { MIN_PASSWORD_LENGTH } from '../services/password';

export interface LineReader {
  /** Shows the prompt and resolves with the next input line, or null once input has ended. */
  readLine(prompt: string): Promise<string | null>;
}

export interface SessionOutput {
  log(line: string): void;
  error(line: string): void;
}

export class InputClosedError extends Error {
  readonly code = 'INPUT_CLOSED';

  constructor() {
    super('input closed before all answers were read');
    this.name = 'InputClosedError';
  }
}

export function createConsoleLineReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): LineReader & { close(): void } {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  // the iterator buffers lines that arrive before they are asked for (piped stdin)
  const lines = rl[Symbol.asyncIterator]();
  return {
    async readLine(prompt: string) {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close() {
      rl.close();
    }
  };
}

async function ask(reader: LineReader, prompt: string): Promise<string> {
  const line = await reader.readLine(prompt);
  if (line === null) throw new InputClosedError();
  return line.trim();
}

// Decimal integer with an optional sign; anything else is unparseable.
export function parseLength(input: string): number | null {
  if (!/^[+-]?\d+$/.test(input)) return null;
  const n = Number(input);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Unparseable input falls back to the minimum length. A number below the
 * minimum is returned as is and left for the generator to reject.
 */
export async function readLength(reader: LineReader, out: SessionOutput): Promise<number> {
  const input = await ask(reader, `Enter password length (minimum ${MIN_PASSWORD_LENGTH}): `);
  const length = parseLength(input);
  if (length === null) {
    out.log(`Error: Invalid length. Using minimum length of ${MIN_PASSWORD_LENGTH}`);
    return MIN_PASSWORD_LENGTH;
  }
  return length;
}

export async function readYesNo(reader: LineReader, out: SessionOutput, prompt: string): Promise<boolean> {
  for (;;) {
    const answer = (await ask(reader, prompt)).toLowerCase();
    if (answer === 'y' || answer === 'yes') return true;
    if (answer === 'n' || answer === 'no') return false;
    out.log("Please enter 'y' or 'n'");
  }
}
