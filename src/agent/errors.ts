/** Errors that should break the outer agent loop, not be caught by per-tool handlers. */
export class AgentLoopBreak extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentLoopBreak';
  }
}

export class MaxIterationsError extends AgentLoopBreak {
  constructor(public readonly maxIterations: number) {
    super(`max iterations exceeded (${maxIterations})`);
    this.name = 'MaxIterationsError';
  }
}

/** The model call itself failed; the turn cannot continue. */
export class ModelError extends AgentLoopBreak {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ModelError';
  }
}
