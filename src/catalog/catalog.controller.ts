import { Controller, Post, Get, Delete, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { CatalogSeeder } from './catalog.seeder';
import { CatalogCountsDto, CatalogVerificationDto, SetupCatalogDto } from '../dto/catalog.dto';

@ApiTags('catalog')
@Controller('catalog')
export class CatalogController {
  constructor(private readonly catalogSeeder: CatalogSeeder) {}

  @Post('setup')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Load the sample catalog, scheduling shows from the base date on' })
  @ApiResponse({ status: 201, description: 'Row counts after loading', type: CatalogCountsDto })
  @ApiResponse({ status: 409, description: 'The database already holds a catalog' })
  async setup(@Body() setupCatalogDto: SetupCatalogDto): Promise<CatalogCountsDto> {
    return this.catalogSeeder.setup(setupCatalogDto.baseDate);
  }

  @Get('verify')
  @ApiOperation({ summary: 'Check row counts and scan for over-booked shows' })
  @ApiResponse({ status: 200, type: CatalogVerificationDto })
  async verify(): Promise<CatalogVerificationDto> {
    return this.catalogSeeder.verify();
  }

  @Delete()
  @ApiOperation({ summary: 'Remove every theater, movie and everything that depends on them' })
  @ApiResponse({ status: 200, description: 'Row counts before removal', type: CatalogCountsDto })
  async teardown(): Promise<CatalogCountsDto> {
    return this.catalogSeeder.teardown();
  }
}
