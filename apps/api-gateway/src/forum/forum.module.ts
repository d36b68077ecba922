import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ForumReply, ForumThread } from '@hairline/database';
import { ForumController } from './forum.controller';
import { ForumService } from './forum.service';

@Module({
  imports: [TypeOrmModule.forFeature([ForumThread, ForumReply])],
  controllers: [ForumController],
  providers: [ForumService],
})
export class ForumModule {}
