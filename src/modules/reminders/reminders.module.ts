import { Module } from '@nestjs/common';
import { MongoReminderRepository } from '../../common/repository/reminder/mongo-reminder.repository';
import { ReminderRepository } from '../../common/repository/reminder/reminder.repository';
import { LlmModule } from '../llm/llm.module';
import { ReminderExtractorService } from './reminder-extractor.service';
import { RemindersController } from './reminders.controller';
import { RemindersService } from './reminders.service';

@Module({
  imports: [LlmModule],
  controllers: [RemindersController],
  providers: [
    RemindersService,
    ReminderExtractorService,
    { provide: ReminderRepository, useClass: MongoReminderRepository },
  ],
})
export class RemindersModule {}
