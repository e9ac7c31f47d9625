import { ObjectId } from 'mongodb';
import { ReminderSchema, StoredReminder } from './reminder.types';

/**
 * Storage gateway for reminders. Used as the injection token; the Mongo
 * implementation is bound in RemindersModule.
 */
export abstract class ReminderRepository {
  abstract insert(reminder: ReminderSchema): Promise<ObjectId>;

  abstract findByUser(userId: string): Promise<StoredReminder[]>;

  /** Resolves to null for unknown and for malformed ids alike. */
  abstract findById(id: string): Promise<StoredReminder | null>;

  /** Number of deleted documents; 0 for a malformed id. */
  abstract deleteByIdAndUser(id: string, userId: string): Promise<number>;
}
