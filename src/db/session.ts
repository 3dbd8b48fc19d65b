/**
 * Scoped database access for commands.
 */
import type { BackendFactory, DatabaseHandle } from "./backend.js";

/**
 * Open a backend, run `work` in a single transaction and close the backend.
 *
 * The transaction commits when `work` resolves and rolls back when it
 * rejects; the rejection is rethrown unchanged. The backend is closed on
 * every path.
 */
export async function withDatabase<T>(
  open: BackendFactory,
  work: (db: DatabaseHandle) => Promise<T>,
): Promise<T> {
  const backend = open();
  try {
    return await backend.transaction(work);
  } finally {
    await backend.close();
  }
}
