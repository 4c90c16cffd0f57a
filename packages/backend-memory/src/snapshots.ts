import type {
  DocumentSnapshot,
  QueryDocumentSnapshot,
  QuerySnapshot,
  RawFields,
  SnapshotMetadata,
} from '@tidewatch/core';
import { lastSegment } from './paths.js';
import type { StoredDocument } from './query-engine.js';

// Snapshots hand out copies so callers cannot reach stored state

export class MemoryDocumentSnapshot implements DocumentSnapshot {
  readonly id: string;
  readonly exists: boolean;

  constructor(
    readonly path: string,
    private readonly fields: RawFields | null,
    readonly metadata: SnapshotMetadata
  ) {
    this.id = lastSegment(path);
    this.exists = fields !== null;
  }

  data(): RawFields | undefined {
    return this.fields === null ? undefined : structuredClone(this.fields);
  }
}

export class MemoryQueryDocumentSnapshot implements QueryDocumentSnapshot {
  readonly id: string;
  readonly path: string;
  private readonly fields: RawFields;

  constructor(doc: StoredDocument) {
    this.id = doc.id;
    this.path = doc.path;
    this.fields = doc.fields;
  }

  data(): RawFields {
    return structuredClone(this.fields);
  }
}

export class MemoryQuerySnapshot implements QuerySnapshot {
  readonly docs: readonly QueryDocumentSnapshot[];

  constructor(
    docs: readonly StoredDocument[],
    readonly metadata: SnapshotMetadata
  ) {
    this.docs = docs.map((doc) => new MemoryQueryDocumentSnapshot(doc));
  }

  get size(): number {
    return this.docs.length;
  }
}
