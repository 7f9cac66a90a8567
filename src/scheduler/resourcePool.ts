import { CancelledError, ConfigurationError } from "../core/errors.js";
import type { TaskResources } from "../toolpacks/types.js";

interface Waiter {
  request: TaskResources;
  label: string;
  grant(): void;
  cancel(error: CancelledError): void;
}

export interface ResourceLease {
  release(): void;
}

/**
 * Admission control over a global CPU / memory budget. Requests that do not
 * fit wait in FIFO order, and a waiter at the head blocks the ones behind it.
 */
export class ResourcePool {
  private freeCpus: number;
  private freeMemoryMb: number;
  private readonly queue: Waiter[] = [];
  private running = 0;
  private peak = 0;

  constructor(readonly budget: { maxCpus: number; maxMemoryMb: number }) {
    this.freeCpus = budget.maxCpus;
    this.freeMemoryMb = budget.maxMemoryMb;
  }

  get inUse(): TaskResources {
    return { cpus: this.budget.maxCpus - this.freeCpus, memoryMb: this.budget.maxMemoryMb - this.freeMemoryMb };
  }

  get queued(): number {
    return this.queue.length;
  }

  /** Highest number of simultaneously admitted leases. */
  get peakConcurrency(): number {
    return this.peak;
  }

  acquire(request: TaskResources, label: string, signal?: AbortSignal): Promise<ResourceLease> {
    if (request.cpus > this.budget.maxCpus || request.memoryMb > this.budget.maxMemoryMb) {
      return Promise.reject(
        new ConfigurationError(
          `${label}: requests cpus=${request.cpus} memory_mb=${request.memoryMb}, budget is cpus=${this.budget.maxCpus} memory_mb=${this.budget.maxMemoryMb}`
        )
      );
    }
    if (signal?.aborted) return Promise.reject(new CancelledError(`${label}: cancelled before start`));

    return new Promise<ResourceLease>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.queue.indexOf(waiter);
        if (idx >= 0) {
          this.queue.splice(idx, 1);
          waiter.cancel(new CancelledError(`${label}: cancelled while queued`));
          this.pump();
        }
      };
      const waiter: Waiter = {
        request,
        label,
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(this.lease(request));
        },
        cancel: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
      this.pump();
    });
  }

  private lease(request: TaskResources): ResourceLease {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.freeCpus += request.cpus;
        this.freeMemoryMb += request.memoryMb;
        this.running--;
        this.pump();
      }
    };
  }

  private pump(): void {
    for (;;) {
      const head = this.queue[0];
      if (!head) return;
      if (head.request.cpus > this.freeCpus || head.request.memoryMb > this.freeMemoryMb) return;
      this.queue.shift();
      this.freeCpus -= head.request.cpus;
      this.freeMemoryMb -= head.request.memoryMb;
      this.running++;
      this.peak = Math.max(this.peak, this.running);
      head.grant();
    }
  }
}
