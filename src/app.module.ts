import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import databaseConfig, { buildDataSourceOptions, DatabaseConfig } from './config/database.config';
import appConfig from './config/app.config';
import { validate } from './config/env.validation';
import { CommonModule } from './common/common.module';
import { TheatersModule } from './theaters/theaters.module';
import { HallsModule } from './halls/halls.module';
import { MoviesModule } from './movies/movies.module';
import { ShowsModule } from './shows/shows.module';
import { BookingsModule } from './bookings/bookings.module';
import { CatalogModule } from './catalog/catalog.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [databaseConfig, appConfig],
      validate,
    }),
    ThrottlerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => [
        {
          ttl: config.getOrThrow<number>('app.rateLimitTtl') * 1000, // Convert to milliseconds
          limit: config.getOrThrow<number>('app.rateLimitMax'),
        },
      ],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) =>
        buildDataSourceOptions(configService.getOrThrow<DatabaseConfig>('database')),
      inject: [ConfigService],
    }),
    CommonModule,
    TheatersModule,
    HallsModule,
    MoviesModule,
    ShowsModule,
    BookingsModule,
    CatalogModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
