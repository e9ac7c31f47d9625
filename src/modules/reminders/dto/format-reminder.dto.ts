import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

const NO_INPUT = "No input provided. Please send JSON with 'input' field.";
const NO_USER = "No userId provided. Please send JSON with 'userId' field.";

export class FormatReminderDto {
  @ApiProperty({
    description: 'Free-form text describing one or more reminders',
    example: 'Call mom tomorrow at 5pm and pay rent on the 1st',
  })
  @IsString({ message: NO_INPUT })
  @IsNotEmpty({ message: NO_INPUT })
  input!: string;

  @ApiProperty({ description: 'Owner of the reminders', example: 'user-1' })
  @IsString({ message: NO_USER })
  @IsNotEmpty({ message: NO_USER })
  userId!: string;
}
