export interface Observation {
  readonly timestamp: Date;
  readonly target: string;
  readonly event: string;
  readonly details: Record<string, unknown>;
}
