import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

const BOTH_REQUIRED = 'Both id and userId are required';

export class DeleteReminderDto {
  @ApiProperty({ example: '6710f0c2a1b2c3d4e5f60718' })
  @IsString({ message: BOTH_REQUIRED })
  @IsNotEmpty({ message: BOTH_REQUIRED })
  id!: string;

  @ApiProperty({ example: 'user-1' })
  @IsString({ message: BOTH_REQUIRED })
  @IsNotEmpty({ message: BOTH_REQUIRED })
  userId!: string;
}
