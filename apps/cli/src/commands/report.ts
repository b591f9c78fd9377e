import { promises as fs } from 'fs';
import type { RunResult } from '@faultline/domain';
import type { OutputSink } from '../output.js';
import { formatRunReport, parseRunResult } from '../report.js';

export interface ReportArgs {
  file: string;
}

/** Renders a result saved earlier with `run --json-output`. */
export async function reportCommand(args: ReportArgs, deps: { out: OutputSink }): Promise<RunResult> {
  const raw = await fs.readFile(args.file, 'utf8');
  const result = parseRunResult(JSON.parse(raw));
  formatRunReport(result).forEach((line) => deps.out.write(line));
  return result;
}
