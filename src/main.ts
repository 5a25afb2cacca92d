import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { winstonConfig } from './config/logger.config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: winstonConfig,
  });

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Showtime Catalog API')
    .setDescription('Theaters, halls, shows and seat availability for movie ticket booking')
    .setVersion('1.0')
    .addTag('theaters', 'Theaters and their halls')
    .addTag('halls', 'Halls and seat layouts')
    .addTag('movies', 'Movie records per title, language and format')
    .addTag('shows', 'Scheduled shows and seat availability')
    .addTag('bookings', 'Seat bookings and customer history')
    .addTag('catalog', 'Sample catalog setup, verification and teardown')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document);

  const port = app.get(ConfigService).getOrThrow<number>('app.port');
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`API Documentation: http://localhost:${port}/api-docs`);
}
void bootstrap();
