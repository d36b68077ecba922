import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import {
  CounselingMessage,
  CounselingRole,
  GenerationStatus,
} from '@hairline/database';

export class SendMessageDto {
  @IsString()
  @IsNotEmpty({ message: 'Message cannot be empty' })
  @MaxLength(10_000)
  content!: string;
}

export interface SessionDto {
  id: string;
  title: string | null;
  createdAt: Date;
  messageCount: number;
}

export interface MessageDto {
  id: string;
  role: CounselingRole;
  content: string | null;
  status: GenerationStatus;
  createdAt: Date;
}

export interface SessionDetailDto {
  id: string;
  title: string | null;
  createdAt: Date;
  messages: MessageDto[];
}

/** The assistant message stays pending until `taskId` completes. */
export interface SentMessageDto {
  userMessage: MessageDto;
  assistantMessage: MessageDto;
  taskId: string;
}

export interface MessageStatusDto {
  id: string;
  status: GenerationStatus;
  content: string | null;
}

export function toMessageDto(message: CounselingMessage): MessageDto {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    status: message.status,
    createdAt: message.createdAt,
  };
}
