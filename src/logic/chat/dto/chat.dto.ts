import { Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class ChatMessageDto {
    @IsString()
    @MaxLength(1000)
    message!: string;

    @IsOptional()
    @IsString()
    sessionId?: string;

    @IsOptional()
    @IsBoolean()
    speak?: boolean;
}

export class HistoryQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    limit?: number;
}
