import type { OperationResult } from "../workflows/types.js";

export type EnvelopeFormatOptions = {
  compact?: boolean;
};

export type OutputWriter = (text: string) => void;

export const stdoutWriter: OutputWriter = (text) => {
  process.stdout.write(text);
};

export function formatEnvelope(
  result: OperationResult,
  options: EnvelopeFormatOptions = {},
): string {
  return options.compact ? JSON.stringify(result) : JSON.stringify(result, null, 2);
}

export function resolveEnvelopeExitCode(result: OperationResult): number {
  return result.success ? 0 : 1;
}
