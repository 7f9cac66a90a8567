import { TopologyError } from "../core/errors.js";
import type { Flow } from "./flow.js";

/**
 * Append-only record stream with exactly one producer and at most one consumer.
 *
 * Records are buffered until the consumer pulls them; once pulled they are gone.
 * Fan-out to several consumers is declared with `broadcast()`.
 */
export class Stream<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;
  private wake: (() => void) | null = null;
  private consumer: string | null = null;

  constructor(
    readonly flow: Flow,
    readonly name: string,
    readonly producer: string
  ) {}

  get isClosed(): boolean {
    return this.closed || this.failure !== null;
  }

  emit(record: T): void {
    if (this.isClosed) throw new TopologyError(`emit on closed channel ${this.name}`, this.producer);
    this.buffer.push(record);
    this.notify();
  }

  close(): void {
    if (this.isClosed) return;
    this.closed = true;
    this.notify();
  }

  fail(error: unknown): void {
    if (this.isClosed) return;
    this.failure = { error };
    this.notify();
  }

  /** Claims the stream for one consumer node; the returned iterator is single-pass. */
  subscribe(consumer: string): AsyncIterable<T> {
    if (this.consumer !== null) {
      throw new TopologyError(
        `channel ${this.name} is already consumed by ${this.consumer}; declare a broadcast for ${consumer}`,
        consumer
      );
    }
    this.consumer = consumer;
    return { [Symbol.asyncIterator]: () => this.drain() };
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.subscribe(`anonymous:${this.name}`)[Symbol.asyncIterator]();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    if (wake) wake();
  }

  private async *drain(): AsyncGenerator<T, void, undefined> {
    for (;;) {
      if (this.buffer.length > 0) {
        const next = this.buffer[0];
        this.buffer.splice(0, 1);
        yield next;
        continue;
      }
      if (this.failure) throw this.failure.error;
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }
}

interface ValueWaiter<T> {
  resolve(value: T): void;
  reject(error: unknown): void;
}

type ValueState<T> =
  | { state: "pending"; waiters: Array<ValueWaiter<T>> }
  | { state: "set"; value: T }
  | { state: "failed"; error: unknown };

/** Singleton channel: every consumer observes the same value. */
export class Value<T> {
  private current: ValueState<T> = { state: "pending", waiters: [] };

  constructor(
    readonly name: string,
    readonly producer: string
  ) {}

  get isSettled(): boolean {
    return this.current.state !== "pending";
  }

  set(value: T): void {
    if (this.current.state !== "pending") {
      throw new TopologyError(`value channel ${this.name} was already produced`, this.producer);
    }
    const { waiters } = this.current;
    this.current = { state: "set", value };
    for (const w of waiters) w.resolve(value);
  }

  fail(error: unknown): void {
    if (this.current.state !== "pending") return;
    const { waiters } = this.current;
    this.current = { state: "failed", error };
    for (const w of waiters) w.reject(error);
  }

  get(): Promise<T> {
    const current = this.current;
    switch (current.state) {
      case "set":
        return Promise.resolve(current.value);
      case "failed":
        return Promise.reject(current.error);
      case "pending":
        return new Promise<T>((resolve, reject) => {
          current.waiters.push({ resolve, reject });
        });
    }
  }
}

export type Channel<T> = Stream<T> | Value<T>;
