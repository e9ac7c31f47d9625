import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  JsonObject,
  isRecord,
  toJsonFriendly,
} from '../../common/helper/document.helper';
import { errorMessage } from '../../common/helper/error.helper';
import { ReminderRepository } from '../../common/repository/reminder/reminder.repository';
import { StoredReminder } from '../../common/repository/reminder/reminder.types';
import { LlmService } from '../llm/llm.service';
import { DeleteReminderDto } from './dto/delete-reminder.dto';
import { FormatReminderDto } from './dto/format-reminder.dto';
import {
  InvalidReminderError,
  applyReminderDefaults,
  parseReminderDraft,
} from './reminder-draft';
import { ReminderExtractorService } from './reminder-extractor.service';
import {
  FORMAT_REMINDER_SYSTEM_PROMPT,
  buildFormatReminderPrompt,
} from './reminder.prompt';

export interface SingleReminderResponse {
  success: true;
  reminder: JsonObject;
}

export interface BatchReminderResponse {
  success: true;
  reminders: JsonObject[];
  count: number;
  errors: string[] | null;
}

export interface ReminderSummary {
  id: string;
  title: string;
  date: string;
  time: string;
  userId: string;
  created_at: string;
  updated_at: string;
}

@Injectable()
export class RemindersService {
  private readonly logger = new Logger(RemindersService.name);

  constructor(
    private readonly reminders: ReminderRepository,
    private readonly llm: LlmService,
    private readonly extractor: ReminderExtractorService,
  ) {}

  async formatReminder(
    dto: FormatReminderDto,
  ): Promise<SingleReminderResponse | BatchReminderResponse> {
    const content = await this.llm.complete({
      systemPrompt: FORMAT_REMINDER_SYSTEM_PROMPT,
      prompt: buildFormatReminderPrompt(dto.input),
    });
    this.logger.log(`LLM response: ${content}`);

    const extraction = this.extractor.extract(content);
    switch (extraction.kind) {
      case 'array':
        return this.saveBatch(
          extraction.candidates.map((candidate) => ({
            ...candidate,
            userId: dto.userId,
          })),
        );
      case 'object': {
        const reminder = await this.save({
          ...extraction.candidate,
          userId: dto.userId,
        });
        return { success: true, reminder };
      }
      case 'unparseable':
        throw new BadRequestException({
          error: 'Failed to parse or post JSON',
          details: extraction.details,
          raw: extraction.raw,
        });
      case 'none':
        throw new BadRequestException({
          error: 'No JSON found in LLM response',
          raw: extraction.raw,
        });
    }
  }

  async getReminders(userId: string) {
    const items = await this.reminders.findByUser(userId);
    this.logger.log(`Found ${items.length} reminders for user ${userId}`);

    const now = new Date();
    const reminders = items.map((item) => this.toSummary(item, now));
    return { success: true, reminders, count: reminders.length };
  }

  async getReminderById(id: string): Promise<SingleReminderResponse> {
    const found = await this.reminders.findById(id);
    if (!found) {
      throw new NotFoundException({
        error: `Reminder with ID ${id} not found`,
      });
    }
    return { success: true, reminder: toJsonFriendly(found) };
  }

  async saveReminderData(
    body: unknown,
  ): Promise<SingleReminderResponse | BatchReminderResponse> {
    if (isEmptyBody(body)) {
      throw new BadRequestException({ error: 'No reminder data provided' });
    }
    if (Array.isArray(body)) return this.saveBatch(body);

    let reminder: JsonObject;
    try {
      reminder = await this.save(body);
    } catch (error) {
      if (error instanceof InvalidReminderError) {
        throw new BadRequestException({ error: error.message });
      }
      throw new InternalServerErrorException({
        error: `Failed to save reminder data: ${errorMessage(error)}`,
      });
    }
    return { success: true, reminder };
  }

  async deleteReminder(dto: DeleteReminderDto) {
    const deleted = await this.reminders.deleteByIdAndUser(dto.id, dto.userId);
    if (deleted === 0) {
      throw new NotFoundException({
        error: `Reminder with ID ${dto.id} and userId ${dto.userId} not found`,
      });
    }
    return { success: true, message: `Reminder with ID ${dto.id} deleted` };
  }

  // Validate, default and insert one record; resolves to its client projection.
  private async save(item: unknown): Promise<JsonObject> {
    const reminder = applyReminderDefaults(parseReminderDraft(item));
    const _id = await this.reminders.insert(reminder);
    this.logger.log(`Saved reminder ${_id.toHexString()}`);
    return toJsonFriendly({ ...reminder, _id });
  }

  // Records are saved in order; a failing record never stops its siblings.
  private async saveBatch(
    items: readonly unknown[],
  ): Promise<BatchReminderResponse> {
    const reminders: JsonObject[] = [];
    const errors: string[] = [];

    for (const item of items) {
      try {
        reminders.push(await this.save(item));
      } catch (error) {
        const message = `Error processing reminder: ${errorMessage(error)}`;
        this.logger.warn(message);
        errors.push(message);
      }
    }

    if (!reminders.length) {
      throw new BadRequestException({
        error: 'No valid reminders found',
        details: errors,
      });
    }
    return {
      success: true,
      reminders,
      count: reminders.length,
      errors: errors.length ? errors : null,
    };
  }

  private toSummary(item: StoredReminder, now: Date): ReminderSummary {
    return {
      id: String(item._id),
      title: item.title ?? '',
      date: item.date ?? '',
      time: item.time ?? '',
      userId: item.userId ?? '',
      created_at: toIsoString(item.created_at, now),
      updated_at: toIsoString(item.updated_at, now),
    };
  }
}

function isEmptyBody(body: unknown): boolean {
  if (body === null || body === undefined) return true;
  if (Array.isArray(body)) return body.length === 0;
  return isRecord(body) && Object.keys(body).length === 0;
}

// legacy documents may hold the timestamp as a string
function toIsoString(value: unknown, fallback: Date): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' && value) return value;
  return fallback.toISOString();
}
