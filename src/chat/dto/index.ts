import { ApiProperty } from '@nestjs/swagger';
import { IsString, MaxLength } from 'class-validator';

export class SendMessageDto {
  @ApiProperty({ example: 'What goes into a demand letter?' })
  @IsString()
  @MaxLength(4000)
  message!: string;
}

export class ChatReplyDto {
  @ApiProperty({ example: 'A demand letter usually states the claim...' })
  response!: string;
}

export class ChatMessageDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  user_message!: string;

  @ApiProperty({ type: String, nullable: true })
  bot_response!: string | null;

  @ApiProperty()
  timestamp!: Date;
}
