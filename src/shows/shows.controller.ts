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
import { ShowsService } from './shows.service';
import { CreateShowDto, ShowFilterQueryDto, ShowResponseDto, UpdateShowDto } from '../dto/show.dto';
import { ShowAvailabilityDto, ShowSeatAvailabilityDto, ShowsByTheaterQueryDto } from '../dto/availability.dto';
import { DeleteOptionsDto } from '../dto/common.dto';

@ApiTags('shows')
@Controller('shows')
export class ShowsController {
  constructor(private readonly showsService: ShowsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Schedule a show; the end time is derived from the movie duration' })
  @ApiResponse({ status: 201, description: 'Show created', type: ShowResponseDto })
  @ApiResponse({ status: 409, description: 'The hall already has a show in that slot' })
  async createShow(@Body() createShowDto: CreateShowDto): Promise<ShowResponseDto> {
    return this.showsService.createShow(createShowDto);
  }

  @Get()
  @ApiOperation({ summary: 'List shows, optionally by date, hall or movie' })
  @ApiResponse({ status: 200, description: 'Shows', type: [ShowResponseDto] })
  async getShows(@Query() filter: ShowFilterQueryDto): Promise<ShowResponseDto[]> {
    return this.showsService.getShows(filter);
  }

  @Get('availability')
  @ApiOperation({ summary: 'Active shows at a theater on a date with the seats still available' })
  @ApiResponse({ status: 200, description: 'Shows ordered by start time', type: [ShowAvailabilityDto] })
  async getShowsByTheaterAndDate(@Query() query: ShowsByTheaterQueryDto): Promise<ShowAvailabilityDto[]> {
    return this.showsService.findShowsByTheaterAndDate(query.theater, query.date);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a show' })
  @ApiResponse({ status: 200, type: ShowResponseDto })
  @ApiResponse({ status: 404, description: 'Show not found' })
  async getShow(@Param('id', ParseIntPipe) showId: number): Promise<ShowResponseDto> {
    return this.showsService.getShow(showId);
  }

  @Get(':id/availability')
  @ApiOperation({ summary: 'Booked and available seats of one show, with its seat map' })
  @ApiResponse({ status: 200, type: ShowSeatAvailabilityDto })
  @ApiResponse({ status: 404, description: 'Show not found' })
  async getShowAvailability(@Param('id', ParseIntPipe) showId: number): Promise<ShowSeatAvailabilityDto> {
    return this.showsService.getShowAvailability(showId);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a show' })
  @ApiResponse({ status: 200, type: ShowResponseDto })
  @ApiResponse({ status: 409, description: 'The show has bookings and cannot change hall' })
  async updateShow(
    @Param('id', ParseIntPipe) showId: number,
    @Body() updateShowDto: UpdateShowDto,
  ): Promise<ShowResponseDto> {
    return this.showsService.updateShow(showId, updateShowDto);
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate a show' })
  @ApiResponse({ status: 200, type: ShowResponseDto })
  async deactivateShow(@Param('id', ParseIntPipe) showId: number): Promise<ShowResponseDto> {
    return this.showsService.deactivateShow(showId);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a show; pass cascade=true to delete its bookings too' })
  @ApiResponse({ status: 204, description: 'Show deleted' })
  @ApiResponse({ status: 409, description: 'The show still has bookings' })
  async deleteShow(@Param('id', ParseIntPipe) showId: number, @Query() options: DeleteOptionsDto): Promise<void> {
    await this.showsService.deleteShow(showId, options.cascade ?? false);
  }
}
