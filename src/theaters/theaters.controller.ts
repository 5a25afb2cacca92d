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
import { TheatersService } from './theaters.service';
import { HallsService } from '../halls/halls.service';
import { CreateTheaterDto, TheaterDetailDto, TheaterResponseDto, UpdateTheaterDto } from '../dto/theater.dto';
import { HallResponseDto } from '../dto/hall.dto';
import { DeleteOptionsDto } from '../dto/common.dto';

@ApiTags('theaters')
@Controller('theaters')
export class TheatersController {
  constructor(
    private readonly theatersService: TheatersService,
    private readonly hallsService: HallsService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a theater' })
  @ApiResponse({ status: 201, description: 'Theater created', type: TheaterResponseDto })
  async createTheater(@Body() createTheaterDto: CreateTheaterDto): Promise<TheaterResponseDto> {
    return this.theatersService.createTheater(createTheaterDto);
  }

  @Get()
  @ApiOperation({ summary: 'List active theaters by name' })
  @ApiResponse({ status: 200, description: 'Active theaters', type: [TheaterResponseDto] })
  async getActiveTheaters(): Promise<TheaterResponseDto[]> {
    return this.theatersService.getActiveTheaters();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a theater with its halls' })
  @ApiResponse({ status: 200, type: TheaterDetailDto })
  @ApiResponse({ status: 404, description: 'Theater not found' })
  async getTheater(@Param('id', ParseIntPipe) theaterId: number): Promise<TheaterDetailDto> {
    return this.theatersService.getTheater(theaterId);
  }

  @Get(':id/halls')
  @ApiOperation({ summary: 'List the halls of a theater' })
  @ApiResponse({ status: 200, type: [HallResponseDto] })
  async getHalls(@Param('id', ParseIntPipe) theaterId: number): Promise<HallResponseDto[]> {
    return this.hallsService.getHallsByTheater(theaterId);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a theater' })
  @ApiResponse({ status: 200, type: TheaterResponseDto })
  async updateTheater(
    @Param('id', ParseIntPipe) theaterId: number,
    @Body() updateTheaterDto: UpdateTheaterDto,
  ): Promise<TheaterResponseDto> {
    return this.theatersService.updateTheater(theaterId, updateTheaterDto);
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate a theater' })
  @ApiResponse({ status: 200, type: TheaterResponseDto })
  async deactivateTheater(@Param('id', ParseIntPipe) theaterId: number): Promise<TheaterResponseDto> {
    return this.theatersService.deactivateTheater(theaterId);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a theater; pass cascade=true to delete its halls and everything below them' })
  @ApiResponse({ status: 204, description: 'Theater deleted' })
  @ApiResponse({ status: 409, description: 'The theater still has halls' })
  async deleteTheater(
    @Param('id', ParseIntPipe) theaterId: number,
    @Query() options: DeleteOptionsDto,
  ): Promise<void> {
    await this.theatersService.deleteTheater(theaterId, options.cascade ?? false);
  }
}
