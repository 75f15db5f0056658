/**
 * GenerationManager - last-request-wins dispatcher
 *
 * Interactive callers fire a request on every parameter change. Only the
 * newest request is generated; older requests still waiting are rejected
 * with a SupersededRequestError. A request that has already started runs
 * to completion.
 */

import { SupersededRequestError } from "../errors.js";
import { generate, type GenerationResult } from "./FlowerEngine.js";

export type GenerateFn = (request: unknown) => GenerationResult;

interface PendingRequest {
  timer: ReturnType<typeof setTimeout>;
  reject: (error: Error) => void;
}

export class GenerationManager {
  private pending: Map<number, PendingRequest> = new Map();
  private nextRequestId = 1;
  private disposed = false;
  private readonly generateFn: GenerateFn;

  constructor(generateFn: GenerateFn = generate) {
    this.generateFn = generateFn;
  }

  /** Requests queued but not yet started */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Queue a generation request, superseding any request still waiting.
   */
  request(params: unknown): Promise<GenerationResult> {
    if (this.disposed) {
      return Promise.reject(new Error("[GenerationManager] Manager has been disposed"));
    }

    const id = this.nextRequestId++;
    this.supersedePending();

    return new Promise<GenerationResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        try {
          resolve(this.generateFn(params));
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      }, 0);
      this.pending.set(id, { timer, reject });
    });
  }

  /**
   * Reject everything still waiting and refuse further requests.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const [id, task] of this.pending) {
      clearTimeout(task.timer);
      task.reject(new Error(`[GenerationManager] Request ${id} cancelled: manager disposed`));
    }
    this.pending.clear();
  }

  private supersedePending(): void {
    for (const [id, task] of this.pending) {
      clearTimeout(task.timer);
      task.reject(new SupersededRequestError(id));
    }
    this.pending.clear();
  }
}
