import type { PlayerLogger } from '../contracts/player-logger.js';

export interface ObserverFailure {
  readonly observerIndex: number;
  readonly error: unknown;
}

export interface DispatchReport {
  readonly invoked: number;
  readonly failures: readonly ObserverFailure[];
}

type InvocationOutcome = { readonly ok: true } | { readonly ok: false; readonly error: unknown };

/**
 * Ordered list of observers for one event. Every observer runs inside its own
 * failure boundary; failures are collected into the report and logged, never
 * thrown back to the dispatcher.
 */
export class ObserverRegistry<TArgs extends unknown[]> {
  private readonly observers: Array<(...args: TArgs) => void> = [];

  public constructor(
    private readonly event: string,
    private readonly logger: PlayerLogger,
  ) {}

  public add(observer: (...args: TArgs) => void): boolean {
    if (typeof observer !== 'function') {
      this.logger.warn({ event: this.event }, 'Ignoring non-callable observer');
      return false;
    }

    this.observers.push(observer);
    return true;
  }

  public dispatch(...args: TArgs): DispatchReport {
    const snapshot = [...this.observers];
    const failures: ObserverFailure[] = [];

    snapshot.forEach((observer, observerIndex) => {
      const outcome = invoke(observer, args);
      if (!outcome.ok) {
        failures.push({ observerIndex, error: outcome.error });
      }
    });

    for (const failure of failures) {
      this.logger.error(
        { event: this.event, observerIndex: failure.observerIndex, error: failure.error },
        'Observer execution failed',
      );
    }

    return { invoked: snapshot.length, failures };
  }

  public clear(): void {
    this.observers.length = 0;
  }
}

function invoke<TArgs extends unknown[]>(
  observer: (...args: TArgs) => void,
  args: TArgs,
): InvocationOutcome {
  try {
    observer(...args);
    return { ok: true };
  } catch (error) {
    return { ok: false, error };
  }
}
