import type { GraphQLError } from 'graphql';
import { locatedError } from 'graphql';

import { isPromise } from '../jsutils/isPromise';
import { pathToArray } from '../jsutils/Path';

import type {
  DeferredFragmentRecord,
  DeferredGroupedFieldSetRecord,
  DeferredGroupedFieldSetResult,
  IncrementalDataRecord,
  IncrementalDataRecordResult,
  ReconcilableDeferredGroupedFieldSetResult,
  StreamItemsRecord,
  StreamItemsResult,
  StreamRecord,
  SubsequentResultRecord,
} from './types';
import {
  isDeferredFragmentRecord,
  isDeferredGroupedFieldSetRecord,
} from './types';

/**
 * Tracks the deferred fragments and streams of one request.
 *
 * A deferred fragment is released (announced as pending) once its parent
 * fragment has completed. Results are queued for the publisher only once at
 * least one of the fragments or the stream they belong to has been released;
 * until then they are held on the record.
 *
 * @internal
 */
export class IncrementalGraph {
  private _pending: Set<SubsequentResultRecord>;
  private _newPending: Set<SubsequentResultRecord>;
  private _registered: WeakSet<DeferredFragmentRecord>;
  private _released: WeakSet<DeferredFragmentRecord>;
  private _heldStreamItems: Map<StreamRecord, Array<StreamItemsResult>>;
  private _completedQueue: Array<IncrementalDataRecordResult>;
  private _enqueued: WeakSet<IncrementalDataRecordResult>;
  private _nextId: number;

  // these are assigned within the Promise executor called synchronously within the constructor
  private _signalled!: Promise<void>;
  private _resolve!: () => void;

  constructor() {
    this._pending = new Set();
    this._newPending = new Set();
    this._registered = new WeakSet();
    this._released = new WeakSet();
    this._heldStreamItems = new Map();
    this._completedQueue = [];
    this._enqueued = new WeakSet();
    this._nextId = 0;
    this._reset();
  }

  addIncrementalDataRecords(
    incrementalDataRecords: ReadonlyArray<IncrementalDataRecord>,
  ): void {
    for (const incrementalDataRecord of incrementalDataRecords) {
      if (isDeferredGroupedFieldSetRecord(incrementalDataRecord)) {
        this._addDeferredGroupedFieldSetRecord(incrementalDataRecord);
      } else {
        this._addStreamItemsRecord(incrementalDataRecord);
      }
    }
  }

  /**
   * Releases every record added since the last call, assigning each its id.
   * Deferred fragments without any grouped field set of their own are
   * skipped in favor of their children.
   */
  getNewPending(): ReadonlyArray<SubsequentResultRecord> {
    const newPending: Array<SubsequentResultRecord> = [];
    const newPendingSources = Array.from(this._newPending);
    this._newPending.clear();
    for (const node of newPendingSources) {
      this._release(node, newPending);
    }
    return newPending;
  }

  hasNext(): boolean {
    return this._pending.size > 0;
  }

  isPending(subsequentResultRecord: SubsequentResultRecord): boolean {
    return this._pending.has(subsequentResultRecord);
  }

  hasQueuedResults(): boolean {
    return this._completedQueue.length > 0;
  }

  dequeue(): IncrementalDataRecordResult | undefined {
    return this._completedQueue.shift();
  }

  /**
   * Resolves once a new result has been queued.
   */
  nextSignal(): Promise<void> {
    return this._signalled;
  }

  /**
   * Wakes up any consumer waiting for a new result.
   */
  abort(): void {
    this._trigger();
  }

  /**
   * Completes the fragment if every grouped field set result it expects has
   * been reconciled, returning the results not yet sent.
   */
  completeDeferredFragment(
    deferredFragmentRecord: DeferredFragmentRecord,
  ): Array<ReconcilableDeferredGroupedFieldSetResult> | undefined {
    if (
      !this._pending.has(deferredFragmentRecord) ||
      deferredFragmentRecord.reconcilableResults.size !==
        deferredFragmentRecord.expectedReconcilableResults
    ) {
      return;
    }

    const reconcilableResults: Array<ReconcilableDeferredGroupedFieldSetResult> =
      [];
    for (const reconcilableResult of deferredFragmentRecord.reconcilableResults) {
      if (!reconcilableResult.sent) {
        reconcilableResult.sent = true;
        reconcilableResults.push(reconcilableResult);
      }
    }

    this._pending.delete(deferredFragmentRecord);
    for (const child of deferredFragmentRecord.children) {
      this._newPending.add(child);
    }
    return reconcilableResults;
  }

  /**
   * Marks the fragment as failed. Returns true if the fragment was pending,
   * in which case it is removed and the caller reports it as completed.
   * A fragment that has not yet been released is reported once it is.
   */
  removeDeferredFragment(
    deferredFragmentRecord: DeferredFragmentRecord,
    errors: ReadonlyArray<GraphQLError>,
  ): boolean {
    if (deferredFragmentRecord.errors !== undefined) {
      return false;
    }
    deferredFragmentRecord.errors = errors;
    return this._pending.delete(deferredFragmentRecord);
  }

  removeStream(streamRecord: StreamRecord): void {
    this._pending.delete(streamRecord);
    this._heldStreamItems.delete(streamRecord);
  }

  private _addDeferredGroupedFieldSetRecord(
    deferredGroupedFieldSetRecord: DeferredGroupedFieldSetRecord,
  ): void {
    for (const deferredFragmentRecord of deferredGroupedFieldSetRecord.deferredFragmentRecords) {
      deferredFragmentRecord.expectedReconcilableResults++;
      this._addDeferredFragmentRecord(deferredFragmentRecord);
    }

    const result = deferredGroupedFieldSetRecord.result;
    if (isPromise(result)) {
      result.then(
        (resolved) => this._onDeferredGroupedFieldSetResult(resolved),
        (error: unknown) =>
          this._onDeferredGroupedFieldSetResult({
            deferredFragmentRecords:
              deferredGroupedFieldSetRecord.deferredFragmentRecords,
            path: pathToArray(deferredGroupedFieldSetRecord.path),
            errors: [
              locatedError(
                error,
                undefined,
                pathToArray(deferredGroupedFieldSetRecord.path),
              ),
            ],
          }),
      );
    } else {
      this._onDeferredGroupedFieldSetResult(result);
    }
  }

  private _addDeferredFragmentRecord(
    deferredFragmentRecord: DeferredFragmentRecord,
  ): void {
    if (this._registered.has(deferredFragmentRecord)) {
      return;
    }
    this._registered.add(deferredFragmentRecord);

    const parent = deferredFragmentRecord.parent;
    if (parent === undefined) {
      this._newPending.add(deferredFragmentRecord);
      return;
    }

    if (parent.errors !== undefined) {
      return;
    }

    if (this._released.has(parent) && !this._pending.has(parent)) {
      this._newPending.add(deferredFragmentRecord);
      return;
    }

    parent.children.add(deferredFragmentRecord);
    this._addDeferredFragmentRecord(parent);
  }

  private _addStreamItemsRecord(streamItemsRecord: StreamItemsRecord): void {
    const streamRecord = streamItemsRecord.streamRecord;
    if (streamRecord.id === undefined) {
      this._newPending.add(streamRecord);
    }

    const result = streamItemsRecord.result;
    if (isPromise(result)) {
      result.then(
        (resolved) => this._onStreamItemsResult(resolved),
        (error: unknown) =>
          this._onStreamItemsResult({
            streamRecord,
            errors: [
              locatedError(error, undefined, pathToArray(streamRecord.path)),
            ],
          }),
      );
    } else {
      this._onStreamItemsResult(result);
    }
  }

  private _onDeferredGroupedFieldSetResult(
    deferredGroupedFieldSetResult: DeferredGroupedFieldSetResult,
  ): void {
    let released = false;
    for (const deferredFragmentRecord of deferredGroupedFieldSetResult.deferredFragmentRecords) {
      if (this._pending.has(deferredFragmentRecord)) {
        released = true;
      } else {
        deferredFragmentRecord.results.push(deferredGroupedFieldSetResult);
      }
    }

    if (released) {
      this._enqueue(deferredGroupedFieldSetResult);
    }
  }

  private _onStreamItemsResult(streamItemsResult: StreamItemsResult): void {
    const streamRecord = streamItemsResult.streamRecord;
    if (this._pending.has(streamRecord)) {
      this._enqueue(streamItemsResult);
      return;
    }

    let heldStreamItems = this._heldStreamItems.get(streamRecord);
    if (heldStreamItems === undefined) {
      heldStreamItems = [];
      this._heldStreamItems.set(streamRecord, heldStreamItems);
    }
    heldStreamItems.push(streamItemsResult);
  }

  private _release(
    node: SubsequentResultRecord,
    newPending: Array<SubsequentResultRecord>,
  ): void {
    if (isDeferredFragmentRecord(node)) {
      this._released.add(node);

      if (
        node.expectedReconcilableResults === 0 &&
        node.errors === undefined
      ) {
        for (const child of node.children) {
          this._release(child, newPending);
        }
        return;
      }

      node.id = String(this._nextId++);
      newPending.push(node);

      if (node.errors !== undefined) {
        return;
      }

      this._pending.add(node);
      const heldResults = node.results;
      node.results = [];
      for (const result of heldResults) {
        this._enqueue(result);
      }
      return;
    }

    node.id = String(this._nextId++);
    newPending.push(node);
    this._pending.add(node);

    const heldStreamItems = this._heldStreamItems.get(node);
    if (heldStreamItems !== undefined) {
      this._heldStreamItems.delete(node);
      for (const streamItemsResult of heldStreamItems) {
        this._enqueue(streamItemsResult);
      }
    }
  }

  private _enqueue(completed: IncrementalDataRecordResult): void {
    if (this._enqueued.has(completed)) {
      return;
    }
    this._enqueued.add(completed);
    this._completedQueue.push(completed);
    this._trigger();
  }

  private _trigger() {
    this._resolve();
    this._reset();
  }

  private _reset() {
    this._signalled = new Promise<void>((resolve) => (this._resolve = resolve));
  }
}
