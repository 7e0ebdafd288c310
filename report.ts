import type { ValidationOutcome } from './validate';

export const FORMAT_NAME = 'STL (Standard Tessellation Language)';

export type Report = {
  eventOutcomeInformation: 'pass' | 'fail';
  eventOutcomeDetailNote: string;
  stdout: string | null;
};

export function formatEventOutcomeDetailNote(format: string, version?: string, result?: string): string {
  const parts = [`format="${format}";`];
  if (version !== undefined) parts.push(`version="${version}";`);
  if (result !== undefined) parts.push(`result="${result}"`);
  return parts.join(' ');
}

export function buildReport(target: string, outcome: ValidationOutcome): Report {
  if (outcome.result === 'fail') {
    return {
      eventOutcomeInformation: 'fail',
      eventOutcomeDetailNote: outcome.firstErrorMessage,
      stdout: null,
    };
  }
  return {
    eventOutcomeInformation: 'pass',
    eventOutcomeDetailNote: formatEventOutcomeDetailNote(
      FORMAT_NAME,
      outcome.encoding,
      `errors: ${outcome.errors}; warnings: ${outcome.warnings}`
    ),
    stdout: `${target} validates.`,
  };
}

export function failureReport(message: string): Report {
  return { eventOutcomeInformation: 'fail', eventOutcomeDetailNote: message, stdout: null };
}
