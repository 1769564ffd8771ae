import type { LineReader, SessionOutput } from "../cli/prompt";
import type { SecureRandomSource } from "../services/secure-random";

export function scriptedRandom(values: number[]) {
  const bounds: number[] = [];
  let index = 0;
  const random: SecureRandomSource = {
    randomIndex(bound: number) {
      bounds.push(bound);
      const value = values[index];
      index += 1;
      if (value === undefined) {
        throw new Error(`random script exhausted at call ${index}`);
      }
      return value;
    },
  };
  return { random, bounds };
}

export function failingRandom(failAtCall: number) {
  let calls = 0;
  const random: SecureRandomSource = {
    randomIndex() {
      calls += 1;
      if (calls > failAtCall) {
        throw new Error("entropy unavailable");
      }
      return 0;
    },
  };
  return random;
}

export function scriptedReader(lines: string[]) {
  const prompts: string[] = [];
  let index = 0;
  const reader: LineReader = {
    async readLine(prompt: string) {
      prompts.push(prompt);
      const line = lines[index];
      index += 1;
      return line ?? null;
    },
  };
  return { reader, prompts };
}

export function captureOutput() {
  const logs: string[] = [];
  const errors: string[] = [];
  const out: SessionOutput = {
    log: (line) => {
      logs.push(line);
    },
    error: (line) => {
      errors.push(line);
    },
  };
  return { out, logs, errors };
}
