/**
 * Single-flight task registry
 *
 * Coalesces concurrent work by task id. The first request for an id creates
 * a task and starts its work; later requests for the same id attach to that
 * task and receive the same result. A task is cancelled only when its last
 * request detaches.
 *
 * Every mutation of the task map happens synchronously inside one method
 * call, so the event loop is the mutual-exclusion domain. Callbacks
 * (`start`, `onTaskDone`, `onResult`) never run inside those sections: they
 * are dispatched on the shared {@link CallbackQueue}.
 */

import { v4 as uuidv4 } from 'uuid';
import type { CallbackQueue } from '../utils/callbackQueue';
import { silentLogger, type Logger } from '../utils/logging';
import { errorDetails } from '../errors/baseErrors';

export type RequestId = string;

export type Finish<Result> = (result: Result) => void;

/**
 * Callbacks describing one unit of work
 */
export interface TaskHandlers<Result> {
  /** Starts the work. Called at most once per task, after `addRequest` has returned. */
  start: (finish: Finish<Result>) => void | Promise<void>;
  /** Abandons the work. Called when the last request of an unfinished task is cancelled. */
  cancel: () => void;
  /** Side effects of a finished task, run before any request receives the result. */
  onTaskDone?: (result: Result) => void;
}

interface Request<Result> {
  id: RequestId;
  onResult: (result: Result) => void;
}

interface Task<TaskId, Result> {
  id: TaskId;
  key: string;
  requests: Map<RequestId, Request<Result>>;
  cancel: () => void;
  onTaskDone?: (result: Result) => void;
  finished: boolean;
}

export interface SingleFlightRegistryOptions<TaskId, Result> {
  /** Name used in log output, e.g. 'download' or 'format' */
  name: string;
  callbackQueue: CallbackQueue;
  /** Result delivered when `start` throws */
  failureResult: Result;
  /** Maps a task id to its identity string. Defaults to `String(id)`. */
  keyOf?: (id: TaskId) => string;
  logger?: Logger;
}

export class SingleFlightRegistry<TaskId, Result> {
  private readonly tasks = new Map<string, Task<TaskId, Result>>();
  // Requests stay indexed until delivered, so a late cancel still suppresses delivery
  private readonly requestIndex = new Map<RequestId, Task<TaskId, Result>>();
  private readonly name: string;
  private readonly callbackQueue: CallbackQueue;
  private readonly failureResult: Result;
  private readonly keyOf: (id: TaskId) => string;
  private readonly logger: Logger;

  constructor(options: SingleFlightRegistryOptions<TaskId, Result>) {
    this.name = options.name;
    this.callbackQueue = options.callbackQueue;
    this.failureResult = options.failureResult;
    this.keyOf = options.keyOf ?? (id => String(id));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Attach a request to the task for `taskId`, creating and starting the task
   * if none exists
   *
   * @returns An id that can be passed to {@link cancelRequest}
   */
  addRequest(
    taskId: TaskId,
    handlers: TaskHandlers<Result>,
    onResult: (result: Result) => void
  ): RequestId {
    const request: Request<Result> = { id: uuidv4(), onResult };
    const key = this.keyOf(taskId);

    const existing = this.tasks.get(key);
    if (existing) {
      existing.requests.set(request.id, request);
      this.requestIndex.set(request.id, existing);
      this.logger.debug('Attached request to in-flight task', {
        registry: this.name,
        task: key,
        requests: existing.requests.size
      });
      return request.id;
    }

    const task: Task<TaskId, Result> = {
      id: taskId,
      key,
      requests: new Map([[request.id, request]]),
      cancel: handlers.cancel,
      onTaskDone: handlers.onTaskDone,
      finished: false
    };
    this.tasks.set(key, task);
    this.requestIndex.set(request.id, task);

    this.logger.debug('Created task', { registry: this.name, task: key });

    const finish: Finish<Result> = result => this.finishTask(task, result);
    this.callbackQueue.dispatch(() => this.startTask(task, handlers.start, finish));

    return request.id;
  }

  /**
   * Detach a request from its task. Cancels the task when no requests remain.
   * Unknown or already-detached ids are ignored.
   */
  cancelRequest(requestId: RequestId): void {
    const task = this.requestIndex.get(requestId);
    if (!task) return;

    this.requestIndex.delete(requestId);
    task.requests.delete(requestId);

    if (task.finished || task.requests.size > 0) return;

    if (this.tasks.get(task.key) === task) {
      this.tasks.delete(task.key);
    }
    task.finished = true;

    this.logger.debug('Cancelled task with no remaining requests', {
      registry: this.name,
      task: task.key
    });
    task.cancel();
  }

  get taskCount(): number {
    return this.tasks.size;
  }

  hasTask(taskId: TaskId): boolean {
    return this.tasks.has(this.keyOf(taskId));
  }

  requestCount(taskId: TaskId): number {
    return this.tasks.get(this.keyOf(taskId))?.requests.size ?? 0;
  }

  private startTask(
    task: Task<TaskId, Result>,
    start: TaskHandlers<Result>['start'],
    finish: Finish<Result>
  ): void {
    // Every request was cancelled before the work got going
    if (task.finished) return;

    const fail = (error: unknown) => {
      this.logger.error('Task failed to start', {
        registry: this.name,
        task: task.key,
        ...errorDetails(error)
      });
      finish(this.failureResult);
    };

    try {
      const started = start(finish);
      if (started instanceof Promise) {
        started.catch(fail);
      }
    } catch (error) {
      fail(error);
    }
  }

  private finishTask(task: Task<TaskId, Result>, result: Result): void {
    if (task.finished) {
      this.logger.debug('Discarding result of cancelled task', {
        registry: this.name,
        task: task.key
      });
      return;
    }
    task.finished = true;

    if (this.tasks.get(task.key) === task) {
      this.tasks.delete(task.key);
    }

    const onTaskDone = task.onTaskDone;
    if (onTaskDone) {
      this.callbackQueue.dispatch(() => onTaskDone(result));
    }

    for (const requestId of task.requests.keys()) {
      this.callbackQueue.dispatch(() => {
        const request = task.requests.get(requestId);
        if (!request) return;
        task.requests.delete(requestId);
        this.requestIndex.delete(requestId);
        request.onResult(result);
      });
    }
  }
}
