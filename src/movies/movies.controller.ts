import {
  Controller,
  Post,
  Get,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  ParseIntPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MoviesService } from './movies.service';
import { CreateMovieDto, MovieFilterQueryDto, MovieResponseDto, UpdateMovieDto } from '../dto/movie.dto';
import { DeleteOptionsDto } from '../dto/common.dto';

@ApiTags('movies')
@Controller('movies')
export class MoviesController {
  constructor(private readonly moviesService: MoviesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a movie record (one per title, language and format)' })
  @ApiResponse({ status: 201, description: 'Movie created', type: MovieResponseDto })
  async createMovie(@Body() createMovieDto: CreateMovieDto): Promise<MovieResponseDto> {
    return this.moviesService.createMovie(createMovieDto);
  }

  @Get()
  @ApiOperation({ summary: 'List active movies, optionally by title or language' })
  @ApiResponse({ status: 200, type: [MovieResponseDto] })
  async getMovies(@Query() filter: MovieFilterQueryDto): Promise<MovieResponseDto[]> {
    return this.moviesService.getMovies(filter);
  }

  @Get('now-showing')
  @ApiOperation({ summary: 'Active movies with an active show today or later' })
  @ApiResponse({ status: 200, type: [MovieResponseDto] })
  async getNowShowing(): Promise<MovieResponseDto[]> {
    return this.moviesService.getNowShowing();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a movie' })
  @ApiResponse({ status: 200, type: MovieResponseDto })
  @ApiResponse({ status: 404, description: 'Movie not found' })
  async getMovie(@Param('id', ParseIntPipe) movieId: number): Promise<MovieResponseDto> {
    return this.moviesService.getMovie(movieId);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a movie; a new duration moves the end time of its shows' })
  @ApiResponse({ status: 200, type: MovieResponseDto })
  async updateMovie(
    @Param('id', ParseIntPipe) movieId: number,
    @Body() updateMovieDto: UpdateMovieDto,
  ): Promise<MovieResponseDto> {
    return this.moviesService.updateMovie(movieId, updateMovieDto);
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate a movie' })
  @ApiResponse({ status: 200, type: MovieResponseDto })
  async deactivateMovie(@Param('id', ParseIntPipe) movieId: number): Promise<MovieResponseDto> {
    return this.moviesService.deactivateMovie(movieId);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a movie; pass cascade=true to delete its shows and bookings too' })
  @ApiResponse({ status: 204, description: 'Movie deleted' })
  @ApiResponse({ status: 409, description: 'The movie still has shows' })
  async deleteMovie(@Param('id', ParseIntPipe) movieId: number, @Query() options: DeleteOptionsDto): Promise<void> {
    await this.moviesService.deleteMovie(movieId, options.cascade ?? false);
  }
}
