import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class GetRemindersQueryDto {
  // the query parser turns `userId[key]=x` into an object; only strings pass
  @ApiProperty({ example: 'user-1' })
  @IsString({ message: 'userId is required' })
  @IsNotEmpty({ message: 'userId is required' })
  userId!: string;
}
