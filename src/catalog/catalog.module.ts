import { Module } from '@nestjs/common';
import { CatalogController } from './catalog.controller';
import { CatalogSeeder } from './catalog.seeder';
import { BookingsModule } from '../bookings/bookings.module';
import { ShowsModule } from '../shows/shows.module';

@Module({
  imports: [BookingsModule, ShowsModule],
  controllers: [CatalogController],
  providers: [CatalogSeeder],
  exports: [CatalogSeeder],
})
export class CatalogModule {}
