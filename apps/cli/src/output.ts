import { ZodError } from 'zod';

/** Where command handlers write their human-readable output. */
export interface OutputSink {
  write(line: string): void;
}

export const consoleSink: OutputSink = {
  write: (line) => console.log(line),
};

/** One-line description of a command failure; zod issues are listed by path. */
export function formatCliError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
