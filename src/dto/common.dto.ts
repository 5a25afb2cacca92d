import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

export class DeleteOptionsDto {
  @ApiPropertyOptional({
    default: false,
    description: 'Also delete every dependent row. Without it the delete is refused while dependents exist.',
  })
  @IsOptional()
  @Transform(({ obj, key }: { obj: Record<string, unknown>; key: string }) => {
    const raw = obj[key];
    return typeof raw === 'string' ? raw.toLowerCase() === 'true' : raw;
  })
  @IsBoolean()
  cascade?: boolean;
}
