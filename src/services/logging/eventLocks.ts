import { KeyedMutex } from "../../lib/keyedMutex";

/**
 * Serializes edit and remove of one logged event, so the previous value an edit
 * reverses is the one its replace overwrote.
 */
export class EventLocks {
  private readonly mutex = new KeyedMutex();

  run<T>(user: string, id: string, work: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive([`${user}|${id}`], work);
  }
}
