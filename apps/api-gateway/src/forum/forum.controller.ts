import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { ForumService } from './forum.service';
import {
  CreateReplyDto,
  CreateThreadDto,
  ListThreadsQueryDto,
} from './dto/forum-request.dto';
import type {
  ReplyDto,
  ReplyStatusDto,
  ThreadDetailDto,
  ThreadListDto,
  ThreadListItemDto,
} from './dto/forum-response.dto';

@Controller('api/forum')
@UseGuards(JwtAuthGuard)
export class ForumController {
  constructor(private readonly forumService: ForumService) {}

  @Get('threads')
  list(@Query() query: ListThreadsQueryDto): Promise<ThreadListDto> {
    return this.forumService.listThreads(query.page, query.perPage);
  }

  @Post('threads')
  @HttpCode(HttpStatus.CREATED)
  create(
    @CurrentUser() user: RequestUser,
    @Body() dto: CreateThreadDto,
  ): Promise<ThreadListItemDto> {
    return this.forumService.createThread(user, dto);
  }

  @Get('threads/:id')
  get(@Param('id') id: string): Promise<ThreadDetailDto> {
    return this.forumService.getThread(id);
  }

  @Delete('threads/:id')
  remove(
    @CurrentUser() user: RequestUser,
    @Param('id') id: string,
  ): Promise<{ success: true }> {
    return this.forumService.deleteThread(user, id);
  }

  @Post('threads/:id/replies')
  @HttpCode(HttpStatus.CREATED)
  reply(
    @CurrentUser() user: RequestUser,
    @Param('id') id: string,
    @Body() dto: CreateReplyDto,
  ): Promise<ReplyDto> {
    return this.forumService.createReply(user, id, dto);
  }

  /** Polled by clients waiting on a persona reply. */
  @Get('replies/:id/status')
  replyStatus(@Param('id') id: string): Promise<ReplyStatusDto> {
    return this.forumService.getReplyStatus(id);
  }
}
