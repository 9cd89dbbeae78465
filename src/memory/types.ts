export const MEMORY_KINDS = ["note", "fact", "preference", "task", "context"] as const;

export type MemoryKind = (typeof MEMORY_KINDS)[number];
export type MemorySource = "user" | "llm" | "system";

export interface MemoryEntry {
  readonly id: string;
  readonly kind: MemoryKind;
  readonly content: string;
  readonly tags: string[];
  readonly importance: number;
  readonly source: MemorySource;
  readonly metadata: Record<string, unknown>;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly lastAccessed: string;
  readonly accessCount: number;
}

export interface NewMemory {
  readonly content: string;
  readonly kind?: MemoryKind;
  readonly tags?: readonly string[];
  readonly importance?: number;
  readonly source?: MemorySource;
  readonly metadata?: Record<string, unknown>;
}

/** Fields an update may change. Identity and creation time are fixed. */
export interface MemoryPatch {
  readonly content?: string;
  readonly tags?: readonly string[];
  readonly importance?: number;
  readonly metadata?: Record<string, unknown>;
}

export interface MemoryQuery {
  readonly query?: string;
  /** Matches entries carrying any of these tags. */
  readonly tags?: readonly string[];
  readonly kind?: MemoryKind;
  readonly minImportance?: number;
  readonly limit?: number;
}

export interface MemoryStats {
  readonly total: number;
  readonly maxEntries: number;
  readonly byKind: Record<MemoryKind, number>;
  readonly tombstones: number;
  readonly logBytes: number;
  readonly averageImportance: number;
  readonly oldest?: string;
  readonly newest?: string;
}

export type StoreErrorCode = "not-found" | "invalid" | "capacity-exceeded" | "storage-failure";

export type StoreResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: StoreErrorCode; readonly message: string };

export function isMemoryKind(value: string): value is MemoryKind {
  return MEMORY_KINDS.some((kind) => kind === value);
}

/** One line of the append-only log. */
export type LogRecord =
  | { readonly op: "put"; readonly entry: MemoryEntry }
  | { readonly op: "delete"; readonly id: string; readonly at: string };
