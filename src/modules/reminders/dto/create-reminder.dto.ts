import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class CreateReminderDto {
  @ApiProperty({ example: 'user-1' })
  @IsString({ message: 'userId is required' })
  @IsNotEmpty({ message: 'userId is required' })
  userId!: string;

  @ApiProperty({ required: false, example: 'Call mom' })
  @IsOptional()
  @IsString()
  title?: string | null;

  // YYYY-MM-DD
  @ApiProperty({ required: false, example: '2026-10-20' })
  @IsOptional()
  @IsString()
  date?: string | null;

  // HH:MM (24h)
  @ApiProperty({ required: false, example: '17:00' })
  @IsOptional()
  @IsString()
  time?: string | null;
}
