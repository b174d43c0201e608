type CompletionState<T> = { done: false } | { done: true; value: T };

/**
 * A single-assignment completion. Continuations registered before
 * completion run synchronously inside `complete`; those registered after
 * run immediately.
 */
export class PendingCompletion<T> {
  private state: CompletionState<T> = { done: false };
  private continuations: Array<(value: T) => void> = [];

  complete(value: T): boolean {
    if (this.state.done) {
      return false;
    }

    this.state = { done: true, value };
    const pending = this.continuations;
    this.continuations = [];
    for (const continuation of pending) {
      continuation(value);
    }
    return true;
  }

  isDone(): boolean {
    return this.state.done;
  }

  whenComplete(continuation: (value: T) => void): void {
    if (this.state.done) {
      continuation(this.state.value);
      return;
    }

    this.continuations.push(continuation);
  }

  toPromise(): Promise<T> {
    return new Promise((resolve) => this.whenComplete(resolve));
  }
}
