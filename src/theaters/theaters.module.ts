import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TheatersController } from './theaters.controller';
import { TheatersService } from './theaters.service';
import { HallsModule } from '../halls/halls.module';
import { Theater, Hall } from '../entities';

@Module({
  imports: [TypeOrmModule.forFeature([Theater, Hall]), HallsModule],
  controllers: [TheatersController],
  providers: [TheatersService],
  exports: [TheatersService],
})
export class TheatersModule {}
