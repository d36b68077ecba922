import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Job } from '@hairline/database';
import { TaskStatusDto } from './task-status.dto';

@Injectable()
export class TasksService {
  constructor(
    @InjectRepository(Job)
    private readonly jobRepository: Repository<Job>,
  ) {}

  /**
   * Jobs of other users and system jobs (no owner) are reported as
   * missing, so ids cannot be enumerated.
   */
  async getStatus(taskId: string, userId: string): Promise<TaskStatusDto> {
    const job = await this.jobRepository.findOne({
      where: { id: taskId, userId },
    });

    if (!job) {
      throw new NotFoundException(`Task ${taskId} not found`);
    }

    return TaskStatusDto.fromJob(job);
  }
}
