// corrector/registry - Lazily built lookup tables and debug logging

// =============================================================================
// LAZY TABLES
// =============================================================================

interface LazyTable<T> {
  data: T | null;
  initialized: boolean;
  init: () => T;
}

const tables = new Map<string, LazyTable<unknown>>();

/**
 * Register a table that is built on first access and shared afterwards.
 * The returned getter always yields the same instance until the table is reset.
 *
 * @example
 * const getIrregularForms = defineTable('irregularForms', () => loadIrregularForms());
 * getIrregularForms().get('fui'); // built once, cached afterwards
 */
export function defineTable<T>(name: string, initFn: () => T): () => T {
  const table: LazyTable<T> = {
    data: null,
    initialized: false,
    init: initFn
  };

  tables.set(name, table);

  return () => {
    if (!table.initialized || table.data === null) {
      table.data = table.init();
      table.initialized = true;
      dp(`table ${name} built`);
    }
    return table.data;
  };
}

export function resetTable(name: string): void {
  const table = tables.get(name);
  if (table) {
    table.initialized = false;
    table.data = null;
  }
}

export function resetAllTables(): void {
  for (const table of tables.values()) {
    table.initialized = false;
    table.data = null;
  }
}

export function isTableLoaded(name: string): boolean {
  return tables.get(name)?.initialized ?? false;
}

// Debug logging
// Environment flags are read on every call, after any .env file has been loaded.
let debugOverride: boolean | undefined;

export function envFlag(name: string): boolean {
  const value = process.env[name];
  return value === '1' || value === 'true';
}

export function isDebugEnabled(): boolean {
  return debugOverride ?? envFlag('CORRECTOR_DEBUG');
}

/** Force debug output on or off; `undefined` goes back to CORRECTOR_DEBUG. */
export function setDebug(value: boolean | undefined) {
  debugOverride = value;
}

export function dp(...args: unknown[]) {
  if (isDebugEnabled()) {
    console.log('[DEBUG]', ...args);
  }
}
