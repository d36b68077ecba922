import { ForumReply, GenerationStatus } from '@hairline/database';

export interface AuthorDto {
  id: string;
  name: string;
}

export interface ThreadListItemDto {
  id: string;
  title: string;
  author: AuthorDto;
  isPinned: boolean;
  replyCount: number;
  createdAt: Date;
  lastActivityAt: Date;
}

export interface ThreadListDto {
  threads: ThreadListItemDto[];
  total: number;
  page: number;
  perPage: number;
}

/** Exactly one of `author` and `persona` is set. */
export interface ReplyDto {
  id: string;
  content: string | null;
  status: GenerationStatus;
  author: AuthorDto | null;
  persona: AuthorDto | null;
  parentId: string | null;
  createdAt: Date;
}

export interface ThreadDetailDto {
  id: string;
  title: string;
  content: string;
  author: AuthorDto;
  isPinned: boolean;
  createdAt: Date;
  replies: ReplyDto[];
}

export interface ReplyStatusDto {
  id: string;
  status: GenerationStatus;
  content: string | null;
}

export function toReplyDto(reply: ForumReply): ReplyDto {
  return {
    id: reply.id,
    content: reply.content,
    status: reply.status,
    author: reply.user ? { id: reply.user.id, name: reply.user.fullName } : null,
    persona: reply.persona
      ? { id: reply.persona.id, name: reply.persona.name }
      : null,
    parentId: reply.parentId,
    createdAt: reply.createdAt,
  };
}
