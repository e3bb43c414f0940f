/**
 * Generate Flashcards DTO
 * Payload of the generate_flashcards message
 */

import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsInt,
  Min,
  Max,
  MaxLength,
  Matches,
} from 'class-validator';
export class GenerateFlashcardsDto {
  @IsString()
  @IsNotEmpty()
  declare text: string;

  // Unknown tiers fall back to medium during analysis
  @IsOptional()
  @IsString()
  declare coverage?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(5000)
  declare targetCount?: number;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  declare instruction?: string;

  @IsOptional()
  @Matches(/^[a-zA-Z]{2,3}$/, {
    message: 'language must be a 2-3 letter ISO 639 code',
  })
  declare language?: string;
}
