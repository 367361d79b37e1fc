import { IsISO8601, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

export class AgentProcessDto {
  @IsString()
  @MinLength(1)
  @MaxLength(1000)
  text!: string;

  @IsOptional()
  @IsISO8601({ strict: true, strictSeparator: true })
  now?: string;
}
