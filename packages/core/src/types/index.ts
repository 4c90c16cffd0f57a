export type {
  CollectionRef,
  DocumentRef,
  DocumentSnapshot,
  DocumentStore,
  GetOptions,
  OrderDirection,
  Query,
  QueryDocumentSnapshot,
  QuerySnapshot,
  ReadSource,
  SetOptions,
  SnapshotListenOptions,
  SnapshotMetadata,
  WhereOperator,
} from './backend.js';
export type { IdentifiedFields, JsonModel, Materializer, RawFields } from './model.js';
