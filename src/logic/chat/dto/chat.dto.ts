import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { MAX_HISTORY_PAGE } from '../../conversation-log/types';

export class ChatRequestDto {
  // Blank or missing is answered with a prompt for input, not a 400.
  @IsOptional()
  @IsString()
  message?: string;
}

export class HistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_HISTORY_PAGE)
  limit?: number;
}

export interface ChatResponse {
  response: string;
}
