import { KnowledgeGraph } from '../knowledge-graph';
import { MemoryStorage, SqliteStorage } from '../../storage';
import { CustomDetector } from '../../detectors';
import { FactGraphError } from '../../errors';
import { RelationshipType } from '../../types';
import type {
  DetectedRelationship,
  Fact,
  FactStorage,
  KnowledgeGraphOptions,
  RelationshipDetector,
} from '../../types';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

async function waitUntil(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !condition(); i++) {
    await flush();
  }
  if (!condition()) throw new Error('condition never became true');
}

// Relates every new fact to every existing one with the given type
const relateToAll = (type: RelationshipType, confidence: number) =>
  new CustomDetector((fact, others) => others.map((other) => ({ targetId: other.id, type, confidence })));

class ClosableStorage extends MemoryStorage {
  closeCalls = 0;

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

const graphs: KnowledgeGraph[] = [];
function open(storage: FactStorage, detector?: RelationshipDetector, options?: KnowledgeGraphOptions) {
  const graph = new KnowledgeGraph(storage, detector, options);
  graphs.push(graph);
  return graph;
}

let errorSpy: jest.SpyInstance;
beforeEach(() => {
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});
afterEach(async () => {
  await Promise.all(graphs.splice(0).map((graph) => graph.close()));
  errorSpy.mockRestore();
});

describe('facts', () => {
  it('stores a fact with the given id, content and metadata', async () => {
    const graph = open(new MemoryStorage());
    const fact = await graph.addFact('Water boils at 100C at sea level', 'boil', { unit: 'celsius' });
    expect(fact).toEqual({ id: 'boil', content: 'Water boils at 100C at sea level', metadata: { unit: 'celsius' } });
    expect(await graph.getFact('boil')).toEqual(fact);
  });

  it('generates an id when none is given', async () => {
    const graph = open(new MemoryStorage());
    const fact = await graph.addFact('Granite is an igneous rock');
    expect(fact.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(fact.metadata).toEqual({});
  });

  it('makes a fact readable immediately, before detection runs', async () => {
    const graph = open(new MemoryStorage(), relateToAll(RelationshipType.SUPPORTS, 0.5));
    await graph.addFact('first', 'a');
    const fact = await graph.addFact('second', 'b');
    expect(await graph.getFact('b')).toEqual(fact);
  });

  it('returns null for an unknown id', async () => {
    const graph = open(new MemoryStorage());
    expect(await graph.getFact('missing')).toBeNull();
  });

  it('never queues facts without a detector', async () => {
    const graph = open(new MemoryStorage());
    await graph.addFact('alone', 'a');
    expect(graph.pendingFacts).toBe(0);
    await expect(graph.waitForProcessing()).resolves.toBeUndefined();
  });
});

describe('manual relationships', () => {
  it('reports the source of a contradiction as a contradicting fact', async () => {
    const graph = open(new MemoryStorage());
    await graph.addFact('The bridge opened in 1932', 'fact1');
    await graph.addFact('The bridge is painted red', 'fact2');
    const fact3 = await graph.addFact('The bridge opened in 1937', 'fact3');

    await graph.addManualRelationship('fact3', 'fact1', RelationshipType.CONTRADICTS, 0.9);

    expect(await graph.getContradictingFacts('fact1')).toEqual([fact3]);
    expect(await graph.getSupportingFacts('fact1')).toEqual([]);
    // direction matters: fact1 is the target, not a contradiction of fact3
    expect(await graph.getContradictingFacts('fact3')).toEqual([]);
  });

  it('defaults the confidence to 1.0', async () => {
    const graph = open(new MemoryStorage());
    const relationship = await graph.addManualRelationship('a', 'b', RelationshipType.NEUTRAL);
    expect(relationship).toEqual({
      sourceId: 'a',
      targetId: 'b',
      type: RelationshipType.NEUTRAL,
      confidence: 1.0,
      metadata: {},
    });
  });

  it('keeps a single edge per pair, carrying the last write', async () => {
    const graph = open(new MemoryStorage());
    await graph.addFact('A', 'f1');
    await graph.addFact('B', 'f2');

    await graph.addManualRelationship('f2', 'f1', RelationshipType.SUPPORTS, 0.8);
    await graph.addManualRelationship('f2', 'f1', RelationshipType.SUPPORTS, 0.3);

    const edges = await graph.getRelationships('f1');
    expect(edges).toHaveLength(1);
    expect(edges[0].confidence).toBe(0.3);
  });

  it('skips edges whose source fact was never stored', async () => {
    const graph = open(new MemoryStorage());
    const target = await graph.addFact('target', 't');
    const source = await graph.addFact('real source', 's');
    await graph.addManualRelationship('ghost', 't', RelationshipType.SUPPORTS);
    await graph.addManualRelationship('s', 't', RelationshipType.SUPPORTS);
    expect(await graph.getSupportingFacts(target.id)).toEqual([source]);
  });

  it('rejects an unknown endpoint on a backend that checks references', async () => {
    const storage = new SqliteStorage(':memory:');
    storage.initialize();
    const graph = open(storage);
    await graph.addFact('known', 'known');

    const attempt = graph.addManualRelationship('known', 'ghost', RelationshipType.SUPPORTS);
    await expect(attempt).rejects.toBeInstanceOf(FactGraphError);
    await expect(attempt).rejects.toMatchObject({ code: 'not_found' });
  });
});

describe('queries', () => {
  it('filters relationships by fact and type', async () => {
    const graph = open(new MemoryStorage());
    await graph.addManualRelationship('a', 'b', RelationshipType.SUPPORTS, 0.9);
    await graph.addManualRelationship('c', 'a', RelationshipType.CONTRADICTS, 0.7);
    await graph.addManualRelationship('b', 'c', RelationshipType.NEUTRAL, 0.5);

    expect((await graph.getRelationships()).map((r) => r.sourceId)).toEqual(['a', 'c', 'b']);
    expect((await graph.getRelationships('a')).map((r) => r.sourceId)).toEqual(['a', 'c']);
    expect(await graph.getRelationships('a', RelationshipType.CONTRADICTS)).toEqual([
      { sourceId: 'c', targetId: 'a', type: RelationshipType.CONTRADICTS, confidence: 0.7, metadata: {} },
    ]);
    expect(await graph.getRelationships(undefined, RelationshipType.NEUTRAL)).toHaveLength(1);
  });

  it('counts facts and relationships by type', async () => {
    const graph = open(new MemoryStorage());
    await graph.addFact('one', '1');
    await graph.addFact('two', '2');
    await graph.addFact('three', '3');
    await graph.addManualRelationship('2', '1', RelationshipType.SUPPORTS);
    await graph.addManualRelationship('3', '1', RelationshipType.SUPPORTS);
    await graph.addManualRelationship('3', '2', RelationshipType.CONTRADICTS);

    const stats = await graph.getNetworkStats();
    expect(stats).toEqual({
      totalFacts: 3,
      totalRelationships: 3,
      supportRelationships: 2,
      contradictionRelationships: 1,
      neutralRelationships: 0,
    });
    expect(stats.totalRelationships).toBe(
      stats.supportRelationships + stats.contradictionRelationships + stats.neutralRelationships
    );
  });

  it('never reports a fact as both supporting and contradicting the same target', async () => {
    const graph = open(new MemoryStorage());
    await graph.addFact('claim', 'claim');
    await graph.addFact('evidence', 'evidence');
    await graph.addManualRelationship('evidence', 'claim', RelationshipType.SUPPORTS);
    await graph.addManualRelationship('evidence', 'claim', RelationshipType.CONTRADICTS);

    const supporting = (await graph.getSupportingFacts('claim')).map((f) => f.id);
    const contradicting = (await graph.getContradictingFacts('claim')).map((f) => f.id);
    expect(supporting).toEqual([]);
    expect(contradicting).toEqual(['evidence']);
  });
});

describe('relationship detection', () => {
  it('relates a new fact to the facts that existed before it', async () => {
    const graph = open(new MemoryStorage(), relateToAll(RelationshipType.SUPPORTS, 0.5));
    const a = await graph.addFact('Fact A', 'A');
    await graph.waitForProcessing();
    const b = await graph.addFact('Fact B', 'B');
    await graph.waitForProcessing();

    expect(await graph.getRelationships()).toEqual([
      { sourceId: b.id, targetId: a.id, type: RelationshipType.SUPPORTS, confidence: 0.5, metadata: {} },
    ]);
    expect((await graph.getRelationships()).filter((r) => r.sourceId === a.id)).toEqual([]);
    expect(await graph.getSupportingFacts('A')).toEqual([b]);
    expect(errorSpy).toHaveBeenCalledWith('Processed 1 relationships for fact: B');
  });

  it('processes queued facts in the order they were added', async () => {
    const storage = new MemoryStorage();
    await storage.addFact({ id: 'seed', content: 'seed', metadata: {} });
    const seen: string[] = [];
    const graph = open(
      storage,
      new CustomDetector((fact) => {
        seen.push(fact.id);
        return [];
      })
    );

    await graph.addFact('x', 'x');
    await graph.addFact('y', 'y');
    await graph.addFact('z', 'z');
    await graph.waitForProcessing();

    expect(seen).toEqual(['x', 'y', 'z']);
    expect(graph.pendingFacts).toBe(0);
  });

  it('leaves the graph stable once processing has drained', async () => {
    const graph = open(new MemoryStorage(), relateToAll(RelationshipType.NEUTRAL, 0.4));
    await graph.addFact('one', '1');
    await graph.waitForProcessing();
    await graph.addFact('two', '2');
    await graph.addFact('three', '3');
    await graph.waitForProcessing();

    const settled = await graph.getRelationships();
    await flush();
    await flush();
    expect(await graph.getRelationships()).toEqual(settled);
  });

  it('writes the remaining detections when one of them cannot be stored', async () => {
    const storage = new SqliteStorage(':memory:');
    storage.initialize();
    const detector = new CustomDetector((fact, others) => [
      { targetId: 'ghost', type: RelationshipType.SUPPORTS, confidence: 0.9 },
      ...others.map((other) => ({ targetId: other.id, type: RelationshipType.SUPPORTS, confidence: 0.7 })),
    ]);
    const graph = open(storage, detector);

    await graph.addFact('Fact A', 'A');
    await graph.waitForProcessing();
    await graph.addFact('Fact B', 'B');
    await graph.waitForProcessing();

    expect((await graph.getRelationships()).map((r) => `${r.sourceId}->${r.targetId}`)).toEqual(['B->A']);
    expect(errorSpy).toHaveBeenCalledWith(
      'Failed to write relationship B -> ghost: Relationship endpoint B -> ghost not found'
    );
    expect(errorSpy).toHaveBeenCalledWith('Processed 1 relationships for fact: B');
  });

  it('keeps going when the detector throws', async () => {
    const detector: RelationshipDetector = {
      detect: async () => {
        throw new Error('model unavailable');
      },
    };
    const graph = open(new MemoryStorage(), detector);
    await graph.addFact('first', 'f1');
    await graph.addFact('second', 'f2');

    await expect(graph.waitForProcessing()).resolves.toBeUndefined();
    expect(await graph.getRelationships()).toEqual([]);
    expect(errorSpy).toHaveBeenCalledWith('Error processing relationships for fact f2: model unavailable');
  });

  it('gives up on a detection that outlives the timeout and moves on', async () => {
    let calls = 0;
    const detector: RelationshipDetector = {
      detect: async (fact: Fact, others: readonly Fact[]): Promise<DetectedRelationship[]> => {
        calls++;
        if (calls === 1) return new Promise<DetectedRelationship[]>(() => undefined);
        return others.map((other) => ({ targetId: other.id, type: RelationshipType.SUPPORTS, confidence: 0.6 }));
      },
    };
    const graph = open(new MemoryStorage(), detector, { detectionTimeoutMs: 20 });

    await graph.addFact('a', 'a');
    await graph.waitForProcessing();
    await graph.addFact('b', 'b');
    await graph.waitForProcessing();

    expect(errorSpy).toHaveBeenCalledWith(
      'Relationship detection timed out for fact b: Relationship detection for fact b timed out after 20ms'
    );
    expect(await graph.getRelationships()).toEqual([]);

    await graph.addFact('c', 'c');
    await graph.waitForProcessing();
    expect((await graph.getRelationships()).map((r) => `${r.sourceId}->${r.targetId}`)).toEqual(['c->a', 'c->b']);
  });
});

describe('close', () => {
  it('closes the storage backend once', async () => {
    const storage = new ClosableStorage();
    const graph = open(storage);
    await graph.close();
    await graph.close();
    expect(storage.closeCalls).toBe(1);
  });

  it('rejects writes after closing', async () => {
    const graph = open(new MemoryStorage());
    await graph.close();
    await expect(graph.addFact('late')).rejects.toMatchObject({ code: 'closed' });
    await expect(graph.addManualRelationship('a', 'b', RelationshipType.SUPPORTS)).rejects.toMatchObject({
      code: 'closed',
    });
  });

  it('abandons a detection in flight and releases waiters', async () => {
    let calls = 0;
    const detector: RelationshipDetector = {
      detect: () => {
        calls++;
        return new Promise<DetectedRelationship[]>(() => undefined);
      },
    };
    const storage = new ClosableStorage();
    const graph = open(storage, detector);

    await graph.addFact('a', 'a');
    await graph.waitForProcessing();
    await graph.addFact('b', 'b');
    await waitUntil(() => calls === 1);

    const draining = graph.waitForProcessing();
    await graph.close();

    await expect(draining).resolves.toBeUndefined();
    expect(graph.pendingFacts).toBe(0);
    expect(storage.closeCalls).toBe(1);
    expect(errorSpy).not.toHaveBeenCalledWith(expect.stringContaining('did not stop'));
  });

  it('stops waiting for a stuck worker after the close timeout', async () => {
    class StuckStorage extends ClosableStorage {
      async getAllFacts(): Promise<Fact[]> {
        return new Promise<Fact[]>(() => undefined);
      }
    }
    const storage = new StuckStorage();
    const graph = open(storage, relateToAll(RelationshipType.SUPPORTS, 0.5), { closeTimeoutMs: 20 });
    await graph.addFact('a', 'a');
    await flush();

    await graph.close();

    expect(errorSpy).toHaveBeenCalledWith('Relationship worker did not stop within 20ms; closing anyway');
    expect(storage.closeCalls).toBe(1);
  });
});
