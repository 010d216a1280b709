import {
  IsBoolean,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class UserTextMessageDto {
  @IsString()
  @MaxLength(8000)
  message!: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  correlation_id?: string;

  @IsOptional()
  @IsString()
  client_agent?: string;
}

export class VoiceRequestDto {
  @IsString()
  @MaxLength(8000)
  text!: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  voice?: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  correlation_id?: string;

  @IsOptional()
  @IsString()
  client_agent?: string;
}

export class VoiceSettingsDto {
  @IsBoolean()
  enabled!: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  voice?: string;
}
