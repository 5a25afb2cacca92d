import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HallsController } from './halls.controller';
import { SeatsController } from './seats.controller';
import { HallsService } from './halls.service';
import { SeatsService } from './seats.service';
import { Theater, Hall, Seat, Show, BookingSeat } from '../entities';

@Module({
  imports: [TypeOrmModule.forFeature([Theater, Hall, Seat, Show, BookingSeat])],
  controllers: [HallsController, SeatsController],
  providers: [HallsService, SeatsService],
  exports: [HallsService, SeatsService],
})
export class HallsModule {}
