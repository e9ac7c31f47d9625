import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Options,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { toHttpException } from '../../common/helper/error.helper';
import { CreateReminderDto } from './dto/create-reminder.dto';
import { DeleteReminderDto } from './dto/delete-reminder.dto';
import { FormatReminderDto } from './dto/format-reminder.dto';
import { GetRemindersQueryDto } from './dto/get-reminders-query.dto';
import { RemindersService } from './reminders.service';

@ApiTags('Reminders')
@Controller()
export class RemindersController {
  private readonly logger = new Logger(RemindersController.name);

  constructor(private readonly remindersService: RemindersService) {}

  // CORS headers are added by the cors middleware (see app.setup.ts)
  @ApiOperation({ summary: 'CORS preflight for the POST routes' })
  @Options(['format-reminder', 'reminder-data', 'delete-reminder'])
  preflight() {
    return { status: 'success' };
  }

  @ApiOperation({ summary: 'Turn free-form text into one or more reminders' })
  @Post('format-reminder')
  @HttpCode(HttpStatus.OK)
  async formatReminder(@Body() dto: FormatReminderDto) {
    try {
      this.logger.log(`Formatting reminder for user ${dto.userId}`);
      return await this.remindersService.formatReminder(dto);
    } catch (error) {
      this.logger.error('Error formatting reminder', error);
      throw toHttpException(error);
    }
  }

  @ApiOperation({ summary: 'List reminders of a user' })
  @Get('reminders')
  async getReminders(@Query() query: GetRemindersQueryDto) {
    try {
      return await this.remindersService.getReminders(query.userId);
    } catch (error) {
      this.logger.error('Error fetching reminders', error);
      throw toHttpException(error);
    }
  }

  @ApiOperation({ summary: 'Get a reminder by ID' })
  @Get('reminders/:id')
  async getReminderById(@Param('id') id: string) {
    try {
      return await this.remindersService.getReminderById(id);
    } catch (error) {
      this.logger.error(`Error fetching reminder ${id}`, error);
      throw toHttpException(error);
    }
  }

  @ApiOperation({ summary: 'Save one reminder or a list of reminders as-is' })
  @ApiBody({ type: CreateReminderDto, isArray: true })
  @Post('reminder-data')
  @HttpCode(HttpStatus.OK)
  async saveReminderData(@Body() body: unknown) {
    try {
      return await this.remindersService.saveReminderData(body);
    } catch (error) {
      this.logger.error('Error saving reminder data', error);
      throw toHttpException(error);
    }
  }

  @ApiOperation({ summary: 'Delete a reminder owned by a user' })
  @Post('delete-reminder')
  @HttpCode(HttpStatus.OK)
  async deleteReminder(@Body() dto: DeleteReminderDto) {
    try {
      return await this.remindersService.deleteReminder(dto);
    } catch (error) {
      this.logger.error('Error deleting reminder', error);
      throw toHttpException(error);
    }
  }
}
