/**
 * Errors thrown by the graph engine. All of them signal caller mistakes
 * (bad arguments or a graph shape an algorithm cannot handle); none are
 * transient, so nothing in the engine retries.
 */

export class InvalidStartNodeError extends Error {
  readonly startId: string;

  constructor(startId: string) {
    super(`Start node '${startId}' not found in node set.`);
    this.name = 'InvalidStartNodeError';
    this.startId = startId;
  }
}

export class GraphCycleError extends Error {
  constructor() {
    super('Graph contains at least one cycle.');
    this.name = 'GraphCycleError';
  }
}

export class EdgePathReconstructionError extends Error {
  constructor(from: unknown, to: unknown) {
    super(`No edge found from '${String(from)}' to '${String(to)}' when reconstructing edge path.`);
    this.name = 'EdgePathReconstructionError';
  }
}
