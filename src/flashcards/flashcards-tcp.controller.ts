/**
 * Flashcards TCP Controller
 * Handles inter-service communication via TCP microservice
 *
 * TCP Endpoints:
 * 1. generate_flashcards - Generate question/answer pairs for a document
 * 2. get_generation_health - Health check for service discovery
 */

import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { plainToInstance } from 'class-transformer';
import { validate, type ValidationError } from 'class-validator';
import { FlashcardsService } from './flashcards.service';
import { GenerateFlashcardsDto } from './dto';
import { FlashcardError } from './errors';
import type { FlashcardGenerationResult } from './types';

/**
 * Generate flashcards response payload
 */
interface GenerateFlashcardsResponse {
  success: boolean;
  result?: FlashcardGenerationResult;
  code?: string;
  error?: string;
}

/**
 * Health check response payload
 */
interface HealthCheckResponse {
  success: boolean;
  status: 'healthy' | 'degraded';
  backend?: string;
  capability?: string;
  message?: string;
}

function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .flatMap((error) => Object.values(error.constraints ?? {}))
    .join('; ');
}

@Controller()
export class FlashcardsTcpController {
  private readonly logger = new Logger(FlashcardsTcpController.name);

  constructor(private readonly flashcardsService: FlashcardsService) {}

  /**
   * TCP endpoint: generate_flashcards
   *
   * Input: { text, coverage?, targetCount?, instruction?, language? }
   * Output: { success, result?, code?, error? }
   */
  @MessagePattern({ cmd: 'generate_flashcards' })
  async generateFlashcards(
    @Payload() payload: unknown,
  ): Promise<GenerateFlashcardsResponse> {
    const dto = plainToInstance(GenerateFlashcardsDto, payload ?? {});
    const validationErrors = await validate(dto);
    if (validationErrors.length > 0) {
      const message = formatValidationErrors(validationErrors);
      this.logger.warn(`TCP generate_flashcards rejected: ${message}`);
      return { success: false, code: 'VALIDATION_FAILED', error: message };
    }

    try {
      this.logger.log(
        `TCP generate_flashcards request: ${dto.text.length} chars, coverage=${dto.coverage ?? 'default'}`,
      );

      const result = await this.flashcardsService.generateFlashcards({
        text: dto.text,
        coverage: dto.coverage,
        targetCount: dto.targetCount,
        instruction: dto.instruction,
        language: dto.language,
      });

      this.logger.log(
        `TCP generate_flashcards completed: ${result.pairs.length} pairs`,
      );

      return { success: true, result };
    } catch (error) {
      this.logger.error(
        'TCP generate_flashcards failed',
        error instanceof Error ? error.stack : String(error),
      );

      return {
        success: false,
        code: error instanceof FlashcardError ? error.code : 'INTERNAL_ERROR',
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * TCP endpoint: get_generation_health
   */
  @MessagePattern({ cmd: 'get_generation_health' })
  getGenerationHealth(): HealthCheckResponse {
    try {
      const health = this.flashcardsService.getHealth();

      return {
        success: true,
        status: health.workflowReady ? 'healthy' : 'degraded',
        backend: health.backend,
        capability: health.capability,
      };
    } catch (error) {
      this.logger.error(
        'TCP get_generation_health failed',
        error instanceof Error ? error.stack : String(error),
      );

      return {
        success: false,
        status: 'degraded',
        message: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
