// Large object store
// Boundary to the backing store of BLOB and CLOB values

import type { LobKind } from "../types/kinds";
import { LobValue } from "../values/values";

/**
 * Creates large objects. Only small, fully in-memory lobs are produced by
 * conversions.
 */
export interface LobStore {
  createSmallLob(kind: LobKind, bytes: Uint8Array): LobValue;
}

/**
 * Store keeping lob payloads inline in the value.
 */
export class InMemoryLobStore implements LobStore {
  static readonly Instance = new InMemoryLobStore();

  createSmallLob(kind: LobKind, bytes: Uint8Array): LobValue {
    return LobValue.of(kind, bytes);
  }
}
