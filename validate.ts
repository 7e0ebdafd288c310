import { readFile } from 'node:fs/promises';

import { validateAscii } from './ascii_validator';
import { validateBinary } from './binary_validator';
import type { AccumulatorOptions, Diagnostic } from './diagnostics';
import { DiagnosticAccumulator } from './diagnostics';
import type { Encoding } from './stl_format';
import { detectEncodingOfBytes } from './stl_format';

export type ValidationOptions = AccumulatorOptions;

export type ValidationOutcome = {
  result: 'pass' | 'fail';
  encoding: Encoding;
  errors: number;
  warnings: number;
  /** Rendered message of the first error, empty on pass. */
  firstErrorMessage: string;
  firstError?: Diagnostic;
  diagnostics: readonly Diagnostic[];
};

export function validateBytes(bytes: Uint8Array, options: ValidationOptions = {}): ValidationOutcome {
  const accumulator = new DiagnosticAccumulator(options);
  const encoding = detectEncodingOfBytes(bytes);
  const checked =
    encoding === 'binary'
      ? validateBinary(bytes, accumulator)
      : validateAscii(new TextDecoder().decode(bytes), accumulator);

  const outcome: ValidationOutcome = {
    result: checked.ok ? 'pass' : 'fail',
    encoding,
    errors: accumulator.errorCount,
    warnings: accumulator.warningCount,
    firstErrorMessage: accumulator.firstErrorMessage,
    diagnostics: [...accumulator.diagnostics],
  };
  if (!checked.ok) outcome.firstError = checked.error;
  return outcome;
}

export async function validateFile(filePath: string, options: ValidationOptions = {}): Promise<ValidationOutcome> {
  const bytes = await readFile(filePath);
  return validateBytes(bytes, options);
}
