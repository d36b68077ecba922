import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { TasksService } from './tasks.service';
import { TaskStatusDto } from './task-status.dto';

/**
 * GET /tasks/:id: the single polling endpoint for every job type.
 */
@Controller('tasks')
@UseGuards(JwtAuthGuard)
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Get(':id')
  getStatus(
    @Param('id') taskId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<TaskStatusDto> {
    return this.tasksService.getStatus(taskId, user.userId);
  }
}
