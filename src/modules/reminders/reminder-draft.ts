import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { format } from 'date-fns';
import { isRecord } from '../../common/helper/document.helper';
import { firstValidationMessage } from '../../common/helper/validation.helper';
import { ReminderSchema } from '../../common/repository/reminder/reminder.types';
import { CreateReminderDto } from './dto/create-reminder.dto';

export const DEFAULT_REMINDER_TITLE = 'New Reminder';

export class InvalidReminderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidReminderError';
  }
}

/**
 * Validate one incoming reminder record. Used for list bodies, which the
 * global ValidationPipe cannot type, and for records built from LLM output.
 */
export function parseReminderDraft(item: unknown): CreateReminderDto {
  if (!isRecord(item)) {
    throw new InvalidReminderError('Reminder must be a JSON object');
  }
  const dto = plainToInstance(CreateReminderDto, item);
  const errors = validateSync(dto);
  if (errors.length) {
    throw new InvalidReminderError(firstValidationMessage(errors));
  }
  return dto;
}

/**
 * Fill in missing fields and stamp both timestamps with `now`. An empty
 * time stays empty; only the date falls back to the clock.
 */
export function applyReminderDefaults(
  draft: CreateReminderDto,
  now: Date = new Date(),
): ReminderSchema {
  return {
    userId: draft.userId,
    title: draft.title || DEFAULT_REMINDER_TITLE,
    date: draft.date || format(now, 'yyyy-MM-dd'),
    time: draft.time || '',
    created_at: now,
    updated_at: now,
  };
}
