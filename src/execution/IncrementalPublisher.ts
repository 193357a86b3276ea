import type { GraphQLError } from 'graphql';

import { invariant } from '../jsutils/invariant';
import type { ObjMap } from '../jsutils/ObjMap';
import { pathToArray } from '../jsutils/Path';

import type { Logger } from '../logger';

import { IncrementalGraph } from './IncrementalGraph';
import type {
  CancellableStreamRecord,
  CompletedResult,
  DeferredFragmentRecord,
  DeferredGroupedFieldSetResult,
  ExperimentalIncrementalExecutionResults,
  IncrementalDataRecord,
  IncrementalDeferResult,
  IncrementalResult,
  IncrementalStreamResult,
  InitialIncrementalExecutionResult,
  PendingResult,
  ReconcilableDeferredGroupedFieldSetResult,
  StreamItemsResult,
  StreamRecord,
  SubsequentIncrementalExecutionResult,
  SubsequentResultRecord,
} from './types';
import {
  isCancellableStreamRecord,
  isDeferredFragmentRecord,
  isDeferredGroupedFieldSetRecord,
  isDeferredGroupedFieldSetResult,
  isNonReconcilableDeferredGroupedFieldSetResult,
  isReconcilableStreamItemsResult,
} from './types';

export function buildIncrementalResponse(
  context: IncrementalPublisherContext,
  result: ObjMap<unknown>,
  errors: ReadonlyArray<GraphQLError>,
  incrementalDataRecords: ReadonlyArray<IncrementalDataRecord>,
): ExperimentalIncrementalExecutionResults {
  const incrementalPublisher = new IncrementalPublisher(context);
  return incrementalPublisher.buildResponse(
    result,
    errors,
    incrementalDataRecords,
  );
}

export interface IncrementalPublisherContext {
  cancellableStreams: Set<CancellableStreamRecord>;
  logger: Logger;
}

interface SubsequentIncrementalExecutionResultContext {
  pending: Array<PendingResult>;
  incremental: Array<IncrementalResult>;
  completed: Array<CompletedResult>;
  streamResults: Map<StreamRecord, IncrementalStreamResult<Array<unknown>>>;
}

/**
 * This class is used to publish incremental results to the client, enabling
 * semi-concurrent execution while preserving result order.
 *
 * @internal
 */
class IncrementalPublisher {
  private _context: IncrementalPublisherContext;
  private _incrementalGraph: IncrementalGraph;

  constructor(context: IncrementalPublisherContext) {
    this._context = context;
    this._incrementalGraph = new IncrementalGraph();
  }

  buildResponse(
    data: ObjMap<unknown>,
    errors: ReadonlyArray<GraphQLError>,
    incrementalDataRecords: ReadonlyArray<IncrementalDataRecord>,
  ): ExperimentalIncrementalExecutionResults {
    this._incrementalGraph.addIncrementalDataRecords(incrementalDataRecords);
    const newPending = this._incrementalGraph.getNewPending();

    const pending = newPending.map((node) => this._toPendingResult(node));

    const initialResult: InitialIncrementalExecutionResult =
      errors.length === 0
        ? { data, pending, hasNext: true }
        : { errors, data, pending, hasNext: true };

    return {
      initialResult,
      subsequentResults: this._subscribe(),
    };
  }

  private _toPendingResult(node: SubsequentResultRecord): PendingResult {
    const id = node.id;
    invariant(id !== undefined);
    const pendingResult: PendingResult = {
      id,
      path: pathToArray(node.path),
    };
    if (node.label !== undefined) {
      return { ...pendingResult, label: node.label };
    }
    return pendingResult;
  }

  private _subscribe(): AsyncGenerator<
    SubsequentIncrementalExecutionResult,
    void,
    void
  > {
    let isDone = false;

    const _next = async (): Promise<
      IteratorResult<SubsequentIncrementalExecutionResult, void>
    > => {
      const context: SubsequentIncrementalExecutionResultContext = {
        pending: [],
        incremental: [],
        completed: [],
        streamResults: new Map(),
      };

      while (!isDone) {
        do {
          let completedResult = this._incrementalGraph.dequeue();
          while (completedResult !== undefined) {
            if (isDeferredGroupedFieldSetResult(completedResult)) {
              this._handleCompletedDeferredGroupedFieldSet(
                completedResult,
                context,
              );
            } else {
              this._handleCompletedStreamItems(completedResult, context);
            }
            completedResult = this._incrementalGraph.dequeue();
          }

          this._publishNewPending(context);
        } while (this._incrementalGraph.hasQueuedResults());

        const hasNext = this._incrementalGraph.hasNext();

        if (
          context.incremental.length > 0 ||
          context.completed.length > 0 ||
          !hasNext
        ) {
          if (!hasNext) {
            isDone = true;
            // eslint-disable-next-line no-await-in-loop
            await this._returnStreamIterators();
            this._context.logger.debug('subsequent results completed');
          }

          const subsequentIncrementalExecutionResult: SubsequentIncrementalExecutionResult =
            { hasNext };

          if (context.pending.length > 0) {
            subsequentIncrementalExecutionResult.pending = context.pending;
          }
          if (context.incremental.length > 0) {
            subsequentIncrementalExecutionResult.incremental =
              context.incremental;
          }
          if (context.completed.length > 0) {
            subsequentIncrementalExecutionResult.completed = context.completed;
          }

          return { value: subsequentIncrementalExecutionResult, done: false };
        }

        // newly pending records without any completion travel with the next payload
        // eslint-disable-next-line no-await-in-loop
        await this._incrementalGraph.nextSignal();
      }

      return { value: undefined, done: true };
    };

    const _return = async (): Promise<
      IteratorResult<SubsequentIncrementalExecutionResult, void>
    > => {
      if (!isDone) {
        isDone = true;
        this._incrementalGraph.abort();
        this._context.logger.debug('subsequent results closed early');
      }
      await this._returnStreamIterators();
      return { value: undefined, done: true };
    };

    const _throw = async (
      error?: unknown,
    ): Promise<IteratorResult<SubsequentIncrementalExecutionResult, void>> => {
      if (!isDone) {
        isDone = true;
        this._incrementalGraph.abort();
        this._context.logger.debug('subsequent results closed early');
      }
      await this._returnStreamIterators();
      return Promise.reject(error);
    };

    return {
      [Symbol.asyncIterator]() {
        return this;
      },
      next: _next,
      return: _return,
      throw: _throw,
    };
  }

  private _publishNewPending(
    context: SubsequentIncrementalExecutionResultContext,
  ): void {
    let newPending = this._incrementalGraph.getNewPending();
    while (newPending.length > 0) {
      for (const node of newPending) {
        context.pending.push(this._toPendingResult(node));
        if (!isDeferredFragmentRecord(node)) {
          continue;
        }

        if (node.errors !== undefined) {
          const id = node.id;
          invariant(id !== undefined);
          context.completed.push({ id, errors: node.errors });
          continue;
        }

        this._completeDeferredFragment(node, context);
      }
      newPending = this._incrementalGraph.getNewPending();
    }
  }

  private _handleCompletedDeferredGroupedFieldSet(
    deferredGroupedFieldSetResult: DeferredGroupedFieldSetResult,
    context: SubsequentIncrementalExecutionResultContext,
  ): void {
    if (
      isNonReconcilableDeferredGroupedFieldSetResult(
        deferredGroupedFieldSetResult,
      )
    ) {
      for (const deferredFragmentRecord of deferredGroupedFieldSetResult.deferredFragmentRecords) {
        if (
          this._incrementalGraph.removeDeferredFragment(
            deferredFragmentRecord,
            deferredGroupedFieldSetResult.errors,
          )
        ) {
          const id = deferredFragmentRecord.id;
          invariant(id !== undefined);
          context.completed.push({
            id,
            errors: deferredGroupedFieldSetResult.errors,
          });
        }
      }
      return;
    }

    for (const deferredFragmentRecord of deferredGroupedFieldSetResult.deferredFragmentRecords) {
      deferredFragmentRecord.reconcilableResults.add(
        deferredGroupedFieldSetResult,
      );
    }

    // nested deferred fragments are gated by their parents, nested streams
    // wait until the data holding them has been sent
    this._incrementalGraph.addIncrementalDataRecords(
      deferredGroupedFieldSetResult.incrementalDataRecords.filter(
        isDeferredGroupedFieldSetRecord,
      ),
    );

    for (const deferredFragmentRecord of deferredGroupedFieldSetResult.deferredFragmentRecords) {
      if (this._incrementalGraph.isPending(deferredFragmentRecord)) {
        this._completeDeferredFragment(deferredFragmentRecord, context);
      }
    }
  }

  private _completeDeferredFragment(
    deferredFragmentRecord: DeferredFragmentRecord,
    context: SubsequentIncrementalExecutionResultContext,
  ): void {
    const reconcilableResults =
      this._incrementalGraph.completeDeferredFragment(deferredFragmentRecord);
    if (reconcilableResults === undefined) {
      return;
    }

    const id = deferredFragmentRecord.id;
    invariant(id !== undefined);

    for (const reconcilableResult of reconcilableResults) {
      const { bestId, subPath } = this._getBestIdAndSubPath(
        id,
        deferredFragmentRecord,
        reconcilableResult,
      );
      const incrementalEntry: IncrementalDeferResult = {
        ...reconcilableResult.result,
        id: bestId,
      };
      if (subPath !== undefined) {
        incrementalEntry.subPath = subPath;
      }
      context.incremental.push(incrementalEntry);

      this._incrementalGraph.addIncrementalDataRecords(
        reconcilableResult.incrementalDataRecords.filter(
          (record) => !isDeferredGroupedFieldSetRecord(record),
        ),
      );
    }

    context.completed.push({ id });
  }

  /**
   * Deferred data is sent under the id of the deepest fragment still pending
   * among those it belongs to, with the remainder of its path as `subPath`.
   */
  private _getBestIdAndSubPath(
    initialId: string,
    initialDeferredFragmentRecord: DeferredFragmentRecord,
    deferredGroupedFieldSetResult: ReconcilableDeferredGroupedFieldSetResult,
  ): { bestId: string; subPath: ReadonlyArray<string | number> | undefined } {
    let maxLength = pathToArray(initialDeferredFragmentRecord.path).length;
    let bestId = initialId;

    for (const deferredFragmentRecord of deferredGroupedFieldSetResult.deferredFragmentRecords) {
      if (deferredFragmentRecord === initialDeferredFragmentRecord) {
        continue;
      }
      const id = deferredFragmentRecord.id;
      if (
        id === undefined ||
        !this._incrementalGraph.isPending(deferredFragmentRecord)
      ) {
        continue;
      }
      const length = pathToArray(deferredFragmentRecord.path).length;
      if (length > maxLength) {
        maxLength = length;
        bestId = id;
      }
    }

    const subPath = deferredGroupedFieldSetResult.path.slice(maxLength);
    return {
      bestId,
      subPath: subPath.length > 0 ? subPath : undefined,
    };
  }

  private _handleCompletedStreamItems(
    streamItemsResult: StreamItemsResult,
    context: SubsequentIncrementalExecutionResultContext,
  ): void {
    const streamRecord = streamItemsResult.streamRecord;
    const id = streamRecord.id;
    invariant(id !== undefined);

    if (streamItemsResult.errors !== undefined) {
      context.completed.push({
        id,
        errors: streamItemsResult.errors,
      });
      this._incrementalGraph.removeStream(streamRecord);
      if (isCancellableStreamRecord(streamRecord)) {
        this._context.cancellableStreams.delete(streamRecord);
        // eslint-disable-next-line @typescript-eslint/no-floating-promises
        this._returnStreamIterator(streamRecord);
      }
      return;
    }

    if (!isReconcilableStreamItemsResult(streamItemsResult)) {
      context.completed.push({ id });
      this._incrementalGraph.removeStream(streamRecord);
      if (isCancellableStreamRecord(streamRecord)) {
        this._context.cancellableStreams.delete(streamRecord);
      }
      return;
    }

    const { items, errors } = streamItemsResult.result;
    const existing = context.streamResults.get(streamRecord);
    if (existing === undefined) {
      const incrementalEntry: IncrementalStreamResult<Array<unknown>> = {
        items: [...items],
        id,
      };
      if (errors !== undefined) {
        incrementalEntry.errors = errors;
      }
      context.streamResults.set(streamRecord, incrementalEntry);
      context.incremental.push(incrementalEntry);
    } else {
      existing.items.push(...items);
      if (errors !== undefined) {
        existing.errors = [...(existing.errors ?? []), ...errors];
      }
    }

    this._incrementalGraph.addIncrementalDataRecords(
      streamItemsResult.incrementalDataRecords,
    );
  }

  private _returnStreamIterator(
    streamRecord: CancellableStreamRecord,
  ): Promise<void> {
    return streamRecord.earlyReturn().then(
      () => undefined,
      (error: unknown) => {
        this._context.logger.warn(
          { err: error, path: pathToArray(streamRecord.path) },
          'early return of stream failed',
        );
      },
    );
  }

  private async _returnStreamIterators(): Promise<void> {
    const cancellableStreams = this._context.cancellableStreams;
    if (cancellableStreams.size === 0) {
      return;
    }

    const promises = Array.from(cancellableStreams, (streamRecord) =>
      this._returnStreamIterator(streamRecord),
    );
    cancellableStreams.clear();
    await Promise.all(promises);
  }
}
