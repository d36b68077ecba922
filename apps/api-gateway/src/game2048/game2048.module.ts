import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Game2048Score } from '@hairline/database';
import { Game2048Controller } from './game2048.controller';
import { Game2048Service } from './game2048.service';

@Module({
  imports: [TypeOrmModule.forFeature([Game2048Score])],
  controllers: [Game2048Controller],
  providers: [Game2048Service],
})
export class Game2048Module {}
