import { ObjectId } from 'mongodb';

// Canonical shape written by this service.
export type ReminderSchema = {
  userId: string;
  title: string;
  date: string;
  time: string;
  created_at: Date;
  updated_at: Date;
};

// Documents read back may predate the schema: every field is optional and
// older ids may be plain strings.
export type StoredReminder = Partial<ReminderSchema> & { _id: ObjectId | string };
