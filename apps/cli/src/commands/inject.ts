import type { FaultKind } from '@faultline/domain';
import {
  FaultInjector,
  createFaultSpec,
  describeFailure,
  isSimulatedFailure,
} from '@faultline/engine';
import type { OutputSink } from '../output.js';

export interface InjectArgs {
  fault: FaultKind;
  duration: number;
  errorCode: number;
  message: string;
  target: string;
}

export interface InjectDeps {
  out: OutputSink;
  injector?: FaultInjector;
}

/**
 * Fires one fault at probability 1 and reports what happened.
 * Resolves to true when the injection raised a simulated failure.
 */
export async function injectCommand(args: InjectArgs, deps: InjectDeps): Promise<boolean> {
  const injector = deps.injector ?? new FaultInjector();
  const spec = createFaultSpec({
    kind: args.fault,
    probability: 1,
    durationMs: args.duration,
    errorCode: args.errorCode,
    errorMessage: args.message,
    affectedTargets: [args.target],
  });

  try {
    await injector.inject(spec);
  } catch (err) {
    if (!isSimulatedFailure(err)) throw err;
    const { errorType, category, message } = describeFailure(err);
    deps.out.write(`${args.fault} -> ${args.target}: raised ${errorType} (${category}) ${message}`);
    return true;
  }

  const detail = args.fault === 'latency' ? ` after ${args.duration}ms` : '';
  deps.out.write(`${args.fault} -> ${args.target}: completed${detail}`);
  return false;
}
