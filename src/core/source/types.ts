// src/core/source/types.ts
import type {
  BrowserSettings,
  ItemRef,
  RawEntityRecord,
  RawItemRecord,
  SecondaryEntityKind,
} from '../types/index.js';

/**
 * Remote platform capability. Every call may fail with an opaque error;
 * callers only distinguish success from failure.
 */
export interface ContentSource<TSession> {
  openSession(credentialToken: string | undefined, browser: BrowserSettings): Promise<TSession>;
  closeSession(session: TSession): Promise<void>;
  /** Finite per call, not restartable. */
  fetchTrendingPage(session: TSession, pageSize: number): AsyncIterable<ItemRef>;
  fetchItemDetail(session: TSession, ref: ItemRef): Promise<RawItemRecord>;
  /** Resolves `undefined` when the entity does not exist. */
  fetchSecondaryEntity(
    session: TSession,
    kind: SecondaryEntityKind,
    id: string
  ): Promise<RawEntityRecord | undefined>;
  fetchMediaBytes(session: TSession, ref: ItemRef): Promise<Uint8Array>;
}

/** The slice of the source the enricher needs, already bound to a session. */
export interface SecondaryLookup {
  fetchSecondaryEntity(kind: SecondaryEntityKind, id: string): Promise<RawEntityRecord | undefined>;
}
