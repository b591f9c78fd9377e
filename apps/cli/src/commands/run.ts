import { InMemoryExperimentStore, SystemClock, readExperimentDocument } from '@faultline/adapters';
import type { ClockPort, RandomSourcePort, RunResult } from '@faultline/domain';
import { ExperimentScheduler, FaultInjector, parseExperimentDef } from '@faultline/engine';
import type { OutputSink } from '../output.js';
import { formatRunReport } from '../report.js';

export interface RunArgs {
  experiment: string;
  jsonOutput: boolean;
}

export interface RunDeps {
  out: OutputSink;
  clock?: ClockPort;
  random?: RandomSourcePort;
}

/** Loads a definition file, runs it to completion and prints the result. */
export async function runCommand(args: RunArgs, deps: RunDeps): Promise<RunResult> {
  const definition = parseExperimentDef(await readExperimentDocument(args.experiment));

  const clock = deps.clock ?? new SystemClock();
  const scheduler = new ExperimentScheduler({
    store: new InMemoryExperimentStore(),
    clock,
    injector: new FaultInjector({ random: deps.random, sleep: (ms) => clock.sleep(ms) }),
  });

  const experimentId = scheduler.schedule(definition);
  const result = await scheduler.run(experimentId);

  if (args.jsonOutput) {
    deps.out.write(JSON.stringify(result, null, 2));
  } else {
    formatRunReport(result).forEach((line) => deps.out.write(line));
  }
  return result;
}
