import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { TRADING_MODES, TradingMode } from '../../trading/trade.interface';

export class TradingModeParamDto {
  @ApiProperty({
    description: 'Trading mode',
    example: 'simulation',
    enum: TRADING_MODES,
  })
  @IsIn(TRADING_MODES)
  mode!: TradingMode;
}

export class HistoryQueryDto {
  @ApiPropertyOptional({
    description: 'Number of most recent trades to return',
    example: 10,
    minimum: 1,
    maximum: 1000,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}
