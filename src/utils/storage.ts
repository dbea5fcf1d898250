import { AppError, StorageFailureError } from "./errors";

/** Runs a driver call, rewrapping anything it throws as a StorageFailureError. */
export async function withStorage<T>(operation: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new StorageFailureError(operation, err);
  }
}
