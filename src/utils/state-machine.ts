// src/utils/state-machine.ts

export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export type TransitionListener<S extends string> = (from: S, to: S) => void;

export class InvalidTransitionError extends Error {
  constructor(public from: string, public to: string) {
    super(`Invalid transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Finite state machine over a typed transition table. Illegal transitions
 * throw; every accepted one is kept in `path` and reported to the listener.
 */
export class StateMachine<S extends string> {
  private current: S;
  private readonly visited: S[];

  constructor(
    private readonly table: TransitionTable<S>,
    initial: S,
    private readonly onTransition?: TransitionListener<S>,
  ) {
    this.current = initial;
    this.visited = [initial];
  }

  public get state(): S {
    return this.current;
  }

  public get path(): readonly S[] {
    return this.visited;
  }

  public can(to: S): boolean {
    return this.table[this.current].includes(to);
  }

  public transition(to: S): void {
    if (!this.can(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    const from = this.current;
    this.current = to;
    this.visited.push(to);
    this.onTransition?.(from, to);
  }
}
