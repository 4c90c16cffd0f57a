import { MemoryDocumentStore } from '@tidewatch/backend-memory';
import {
  CollectionSynchronizer,
  DocSynchronizer,
  ObservableValue,
  UnauthenticatedError,
  type DocumentStore,
  type Logger,
  type QueryModifier,
} from '@tidewatch/core';
import { zodModel, type ZodDocument } from '@tidewatch/zod';
import { z } from 'zod';

export const settingsModel = zodModel(
  z.object({
    theme: z.enum(['light', 'dark']).default('light'),
    fontSize: z.number().int().min(8).max(32).default(14),
    displayName: z.string().min(1).optional(),
  })
);

export const noteModel = zodModel(
  z.object({
    title: z.string().min(1),
    done: z.boolean().default(false),
    createdAt: z.number(),
  })
);

export type Settings = ZodDocument<z.infer<typeof settingsModel.schema>>;
export type Note = ZodDocument<z.infer<typeof noteModel.schema>>;
export type Theme = Settings['data']['theme'];
export type NoteFilter = 'all' | 'open' | 'done';

const newestFirst: QueryModifier = (q) => q.orderBy('createdAt', 'desc');

const filters: Record<NoteFilter, QueryModifier> = {
  all: newestFirst,
  open: (q) => newestFirst(q.where('done', '==', false)),
  done: (q) => newestFirst(q.where('done', '==', true)),
};

export interface SettingsAppOptions {
  store?: DocumentStore;
  logger?: Logger;
  /** Notes per page. @default 20 */
  pageSize?: number;
  /** Clock for note timestamps */
  now?: () => number;
}

/**
 * A signed-in user's settings document and notes list, both following the
 * current uid.
 */
export class SettingsApp {
  readonly uid = new ObservableValue<string | null>(null);
  readonly store: DocumentStore;
  readonly settings: DocSynchronizer<Settings>;
  readonly notes: CollectionSynchronizer<Note>;

  private readonly now: () => number;
  private filter: NoteFilter = 'all';

  constructor(options: SettingsAppOptions = {}) {
    this.store = options.store ?? new MemoryDocumentStore();
    this.now = options.now ?? Date.now;

    this.settings = new DocSynchronizer<Settings>({
      store: this.store,
      fromJson: settingsModel.fromJson,
      resolve: (store, uid) => store.doc(`settings/${uid}`),
      identity: this.uid,
      logger: options.logger,
    });

    this.notes = new CollectionSynchronizer<Note>({
      store: this.store,
      fromJson: noteModel.fromJson,
      resolve: (store, uid) => store.collection(`users/${uid}/notes`),
      identity: this.uid,
      query: filters.all,
      pageSize: options.pageSize ?? 20,
      logger: options.logger,
    });
  }

  get activeFilter(): NoteFilter {
    return this.filter;
  }

  signIn(uid: string): void {
    this.uid.next(uid);
  }

  signOut(): void {
    this.uid.next(null);
  }

  setFilter(filter: NoteFilter): void {
    this.filter = filter;
    this.notes.setQuery(filters[filter]);
  }

  /** Change the theme, creating the settings document on first use */
  async setTheme(theme: Theme): Promise<void> {
    await this.writeSettings({ theme }, 'setTheme');
  }

  async setFontSize(fontSize: number): Promise<void> {
    await this.writeSettings({ fontSize }, 'setFontSize');
  }

  async addNote(title: string): Promise<string | null> {
    const fields = noteModel.toJson({ title, done: false, createdAt: this.now() });
    return this.notes.add.execute(fields);
  }

  /** Flip a note's done flag; unknown ids are ignored */
  async toggleNote(id: string): Promise<void> {
    const note = this.notes.notifierFor(id).value;
    if (!note) return;
    await this.notes.update.execute(note.with({ done: !note.data.done }));
  }

  async removeNote(id: string): Promise<void> {
    await this.notes.delete.execute(id);
  }

  dispose(): void {
    this.settings.dispose();
    this.notes.dispose();
    this.uid.destroy();
  }

  private async writeSettings(
    changes: Partial<Settings['data']>,
    operation: string
  ): Promise<void> {
    const uid = this.uid.value;
    if (uid === null) throw new UnauthenticatedError(operation);

    const model = this.settings.current?.with(changes) ?? settingsModel.create(uid, changes);
    await this.settings.write.execute({ model });
  }
}
