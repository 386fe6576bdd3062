import { randomUUID } from 'crypto';
import { ProcessingQueue } from './processing-queue.js';
import { FactGraphError, errorMessage, isFactGraphError } from '../errors.js';
import { RelationshipType } from '../types/index.js';
import type {
  DetectedRelationship,
  Fact,
  FactStorage,
  KnowledgeGraphOptions,
  Metadata,
  NetworkStats,
  Relationship,
  RelationshipDetector,
} from '../types/index.js';

export const DEFAULT_DETECTION_TIMEOUT_MS = 60_000;
export const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;

/**
 * Settle with `work`, or reject on timeout or abort, whichever happens first.
 * The underlying work is not interrupted; its eventual result is ignored.
 */
function boundedCall<T>(
  work: Promise<T>,
  timeoutMs: number,
  signal: AbortSignal,
  operation: string
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(FactGraphError.closed(`${operation} was cancelled`));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(FactGraphError.timeout(operation, timeoutMs));
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    };

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

function countByType(relationships: Relationship[], type: RelationshipType): number {
  return relationships.filter((r) => r.type === type).length;
}

/**
 * KnowledgeGraph - orchestrates fact creation, relationship queries and the
 * background relationship-detection pipeline.
 *
 * Facts are stored synchronously from the caller's point of view. When a
 * detector is configured each new fact is also queued; a single worker takes
 * facts off the queue in order, asks the detector how the fact relates to the
 * rest of the corpus and writes the results back through the storage port.
 * Reads never wait on the queue; call `waitForProcessing()` for a settled view.
 */
export class KnowledgeGraph {
  private queue = new ProcessingQueue<Fact>();
  private abortController = new AbortController();
  private worker: Promise<void>;
  private detectionTimeoutMs: number;
  private closeTimeoutMs: number;
  private closed = false;

  /**
   * @param storage - backend that owns facts and relationships
   * @param detector - optional; without it facts are never queued
   */
  constructor(
    private storage: FactStorage,
    private detector?: RelationshipDetector,
    options: KnowledgeGraphOptions = {}
  ) {
    this.detectionTimeoutMs = options.detectionTimeoutMs ?? DEFAULT_DETECTION_TIMEOUT_MS;
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    this.worker = this.processRelationships(this.abortController.signal).catch((error: unknown) => {
      console.error(`Relationship worker stopped unexpectedly: ${errorMessage(error)}`);
    });
  }

  /** Facts queued or being processed right now. */
  get pendingFacts(): number {
    return this.queue.unfinished;
  }

  /**
   * Store a new fact and, when a detector is configured, queue it for
   * relationship detection. Resolves as soon as the fact is stored.
   */
  async addFact(content: string, factId?: string, metadata?: Metadata): Promise<Fact> {
    this.assertOpen();

    const fact: Fact = {
      id: factId || randomUUID(),
      content,
      metadata: metadata ?? {},
    };

    await this.storage.addFact(fact);

    if (this.detector && !this.closed) {
      this.queue.put(fact);
    }

    return fact;
  }

  async getFact(factId: string): Promise<Fact | null> {
    return this.storage.getFact(factId);
  }

  async getAllFacts(): Promise<Fact[]> {
    return this.storage.getAllFacts();
  }

  /**
   * Write a relationship directly, bypassing the detection queue.
   * Backends that enforce referential integrity reject unknown endpoints.
   */
  async addManualRelationship(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
    confidence = 1.0,
    metadata?: Metadata
  ): Promise<Relationship> {
    this.assertOpen();

    const relationship: Relationship = {
      sourceId,
      targetId,
      type,
      confidence,
      metadata: metadata ?? {},
    };

    await this.storage.addRelationship(relationship);
    return relationship;
  }

  async getRelationships(factId?: string, type?: RelationshipType): Promise<Relationship[]> {
    const relationships = await this.storage.getRelationships(factId);
    return type ? relationships.filter((r) => r.type === type) : relationships;
  }

  /** Facts with a SUPPORTS edge pointing at `factId`. */
  async getSupportingFacts(factId: string): Promise<Fact[]> {
    return this.getIncomingFacts(factId, RelationshipType.SUPPORTS);
  }

  /** Facts with a CONTRADICTS edge pointing at `factId`. */
  async getContradictingFacts(factId: string): Promise<Fact[]> {
    return this.getIncomingFacts(factId, RelationshipType.CONTRADICTS);
  }

  async getNetworkStats(): Promise<NetworkStats> {
    const facts = await this.storage.getAllFacts();
    const relationships = await this.storage.getRelationships();

    const supportRelationships = countByType(relationships, RelationshipType.SUPPORTS);
    const contradictionRelationships = countByType(relationships, RelationshipType.CONTRADICTS);
    const neutralRelationships = countByType(relationships, RelationshipType.NEUTRAL);

    return {
      totalFacts: facts.length,
      totalRelationships: supportRelationships + contradictionRelationships + neutralRelationships,
      supportRelationships,
      contradictionRelationships,
      neutralRelationships,
    };
  }

  /**
   * Resolves once every fact queued so far has been processed.
   */
  async waitForProcessing(): Promise<void> {
    await this.queue.join();
  }

  /**
   * Stop the worker, abandoning any detection in flight, then close the
   * storage backend if it can be closed. Waits at most `closeTimeoutMs`
   * for the worker to exit.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.abortController.abort();
    this.queue.clear();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.closeTimeoutMs);
    });
    const workerTimedOut = await Promise.race([this.worker.then(() => false), timedOut]);
    clearTimeout(timer);
    if (workerTimedOut) {
      console.error(`Relationship worker did not stop within ${this.closeTimeoutMs}ms; closing anyway`);
    }

    if (this.storage.close) {
      await this.storage.close();
    }
  }

  // ---------- internals ----------

  private assertOpen(): void {
    if (this.closed) throw FactGraphError.closed();
  }

  private async getIncomingFacts(factId: string, type: RelationshipType): Promise<Fact[]> {
    const relationships = await this.getRelationships(factId, type);
    const facts: Fact[] = [];

    for (const rel of relationships) {
      if (rel.targetId !== factId) continue;
      const fact = await this.storage.getFact(rel.sourceId);
      if (fact) facts.push(fact);
    }

    return facts;
  }

  private async processRelationships(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let newFact: Fact;
      try {
        newFact = await this.queue.get(signal);
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }

      try {
        await this.processFact(newFact, signal);
      } catch (error) {
        if (signal.aborted) return;
        if (isFactGraphError(error, 'timeout')) {
          console.error(`Relationship detection timed out for fact ${newFact.id}: ${error.message}`);
        } else {
          console.error(`Error processing relationships for fact ${newFact.id}: ${errorMessage(error)}`);
        }
      } finally {
        // clear() already reset the accounting once the graph is closed
        if (!signal.aborted) this.queue.taskDone();
      }
    }
  }

  private async processFact(newFact: Fact, signal: AbortSignal): Promise<void> {
    if (!this.detector) return;

    const allFacts = await this.storage.getAllFacts();
    const existingFacts = allFacts.filter((f) => f.id !== newFact.id);
    if (existingFacts.length === 0 || signal.aborted) return;

    const detected: DetectedRelationship[] = await boundedCall(
      this.detector.detect(newFact, existingFacts),
      this.detectionTimeoutMs,
      signal,
      `Relationship detection for fact ${newFact.id}`
    );

    let written = 0;
    for (const { targetId, type, confidence } of detected) {
      if (signal.aborted) return;
      try {
        await this.storage.updateRelationship(newFact.id, targetId, type, confidence);
        written++;
      } catch (error) {
        // a rejected edge is skipped; the rest of the batch is still written
        console.error(
          `Failed to write relationship ${newFact.id} -> ${targetId}: ${errorMessage(error)}`
        );
      }
    }

    console.error(`Processed ${written} relationships for fact: ${newFact.id}`);
  }
}
