/**
 * Observable Value
 *
 * Of-the-moment published state with a store-style `subscribe`
 * (subscribers receive the current value immediately, then every change).
 */

export type Subscriber<T> = (value: T) => void;

export interface Readable<T> {
  get(): T;
  subscribe(run: Subscriber<T>): () => void;
}

export class ObservableValue<T> implements Readable<T> {
  private readonly subscribers = new Set<Subscriber<T>>();

  constructor(
    private value: T,
    private readonly onSubscriberError: (error: unknown) => void = () => undefined
  ) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    if (Object.is(value, this.value)) {
      return;
    }
    this.value = value;
    this.subscribers.forEach((run) => this.notify(run));
  }

  subscribe(run: Subscriber<T>): () => void {
    this.subscribers.add(run);
    this.notify(run);
    return () => {
      this.subscribers.delete(run);
    };
  }

  private notify(run: Subscriber<T>): void {
    try {
      run(this.value);
    } catch (error) {
      this.onSubscriberError(error);
    }
  }
}
