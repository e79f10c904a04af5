/**
 * The page the executor drives. One surface per conversation, single tab.
 */
export interface BrowsingSurface {
  /** Loads a URL and resolves once the load has committed. */
  navigate(url: string): Promise<void>;
  /** Evaluates a script expression in the page; promises are awaited. */
  evaluateScript(script: string): Promise<unknown>;
  /** PNG bytes of the visible viewport. */
  snapshot(): Promise<Uint8Array>;
  currentURL(): string | null;
  /** False once the surface can no longer render (closed, detached). */
  isAttached(): boolean;
  close(): Promise<void>;
}

/**
 * A slot that admits one outstanding operation at a time. A second start while
 * one is in flight fails instead of queueing behind or replacing the first.
 */
export class OperationGate {
  private inFlight = false;

  constructor(private readonly name: string) {}

  get busy(): boolean {
    return this.inFlight;
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    if (this.inFlight) {
      throw new Error(`${this.name} already in progress`);
    }
    this.inFlight = true;
    try {
      return await operation();
    } finally {
      this.inFlight = false;
    }
  }
}
