import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { DataSource } from 'typeorm';
import { AppModule } from '../src/app.module';
import { HttpExceptionFilter } from '../src/common/filters/http-exception.filter';
import { Movie, Theater } from '../src/entities';
import { TheaterResponseDto } from '../src/dto/theater.dto';
import { HallResponseDto } from '../src/dto/hall.dto';
import { SeatResponseDto } from '../src/dto/seat.dto';
import { MovieResponseDto } from '../src/dto/movie.dto';
import { ShowResponseDto } from '../src/dto/show.dto';

export async function createTestApp(): Promise<INestApplication<App>> {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app: INestApplication<App> = moduleFixture.createNestApplication({ logger: ['error'] });

  // Same pipe and filter as main.ts
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter());

  await app.init();
  return app;
}

/** Theaters cascade to everything but movies; movies take the remaining shows. */
export async function clearDatabase(dataSource: DataSource): Promise<void> {
  await dataSource.createQueryBuilder().delete().from(Theater).execute();
  await dataSource.createQueryBuilder().delete().from(Movie).execute();
}

export interface VenueOptions {
  theaterName?: string;
  hallName?: string;
  seatingCapacity?: number;
  seatCount?: number;
  movieTitle?: string;
  durationMinutes?: number;
  showDate: string;
  startTime?: string;
  basePrice?: number;
}

export interface Venue {
  theater: TheaterResponseDto;
  hall: HallResponseDto;
  seats: SeatResponseDto[];
  movie: MovieResponseDto;
  show: ShowResponseDto;
}

/** One theater with one hall, a row of seats, one movie and one show, created over HTTP. */
export async function createVenue(app: INestApplication<App>, options: VenueOptions): Promise<Venue> {
  const server = app.getHttpServer();

  const theaterResponse = await request(server)
    .post('/theaters')
    .send({
      name: options.theaterName ?? 'E2E Cinema',
      location: '1 Test Street',
      city: 'Testville',
      state: 'Test State',
      postalCode: '00000',
    })
    .expect(201);
  const theater: TheaterResponseDto = theaterResponse.body;

  const hallResponse = await request(server)
    .post('/halls')
    .send({
      theaterId: theater.id,
      name: options.hallName ?? 'Hall 1',
      seatingCapacity: options.seatingCapacity ?? 3,
    })
    .expect(201);
  const hall: HallResponseDto = hallResponse.body;

  const seatCount = options.seatCount ?? 4;
  const seatsResponse = await request(server)
    .post(`/halls/${hall.id}/seats`)
    .send({
      seats: Array.from({ length: seatCount }, (_, index) => ({ rowLabel: 'A', seatNumber: index + 1 })),
    })
    .expect(201);
  const seats: SeatResponseDto[] = seatsResponse.body;

  const movieResponse = await request(server)
    .post('/movies')
    .send({
      title: options.movieTitle ?? 'E2E Test Movie',
      language: 'English',
      format: '2D',
      rating: 'U',
      durationMinutes: options.durationMinutes ?? 120,
    })
    .expect(201);
  const movie: MovieResponseDto = movieResponse.body;

  const showResponse = await request(server)
    .post('/shows')
    .send({
      movieId: movie.id,
      hallId: hall.id,
      showDate: options.showDate,
      startTime: options.startTime ?? '12:15',
      basePrice: options.basePrice ?? 250,
    })
    .expect(201);
  const show: ShowResponseDto = showResponse.body;

  return { theater, hall, seats, movie, show };
}
