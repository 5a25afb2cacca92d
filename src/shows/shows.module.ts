import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ShowsController } from './shows.controller';
import { ShowsService } from './shows.service';
import { Show, Movie, Hall, Booking } from '../entities';

@Module({
  imports: [TypeOrmModule.forFeature([Show, Movie, Hall, Booking])],
  controllers: [ShowsController],
  providers: [ShowsService],
  exports: [ShowsService],
})
export class ShowsModule {}
