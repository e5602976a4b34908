export interface StateMachineOptions {
  verbose: boolean;
}

export interface StateTransition<S> {
  state: S;
  handler: () => Promise<void> | void;
}

/**
 * Runs an ordered list of (state, handler) steps.
 * Each step first enters its state, then runs its handler; after the last
 * step the machine enters the completion state. The first thrown error moves
 * the machine to the error state and is rethrown to the caller.
 */
export abstract class AbstractStateMachine<S, O extends StateMachineOptions> {
  protected state: S;
  protected readonly options: O;
  protected stateTransitions: Array<StateTransition<S>>;

  protected constructor(initialState: S, options: O) {
    this.state = initialState;
    this.options = options;
    this.stateTransitions = [];
  }

  getState(): S {
    return this.state;
  }

  async run(): Promise<void> {
    try {
      for (const transition of this.stateTransitions) {
        this.transitionTo(transition.state);
        await transition.handler.call(this);
      }
      this.transitionTo(this.getCompletionState());
    } catch (error) {
      this.transitionTo(this.getErrorState(), error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  protected transitionTo(nextState: S, error?: Error): void {
    if (nextState === this.getErrorState() && error) {
      console.error(`[${this.constructor.name}] Error occurred during "${String(this.state)}": ${error.message}`);
      this.state = nextState;
      return;
    }
    if (nextState === this.state) return;

    if (this.options.verbose) {
      console.log(`[${this.constructor.name}] ${String(this.state)} -> ${String(nextState)}`);
    }
    const previous = this.state;
    this.state = nextState;
    this.onStateEntered(previous, nextState);
  }

  /**
   * Hook for subclasses; not called for the error state
   */
  protected onStateEntered(_previous: S, _next: S): void {}

  protected abstract getCompletionState(): S;
  protected abstract getErrorState(): S;
}
