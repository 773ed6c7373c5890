import type { ZodError } from 'zod';

export interface RecordProblem {
  path: string;
  message: string;
}

export class MalformedRecordError extends Error {
  readonly issues: RecordProblem[];

  constructor(issues: RecordProblem[]) {
    const first = issues[0];
    const head = first ? `${first.path || '(root)'}: ${first.message}` : 'unknown problem';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(`Malformed snapshot record: ${head}${more}`);
    this.name = 'MalformedRecordError';
    this.issues = issues;
  }

  static fromZod(error: ZodError): MalformedRecordError {
    return new MalformedRecordError(
      error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }))
    );
  }
}
