import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { EvaluationResult } from '../ai/types/evaluation.types';
import { ScreenRequestDto } from './dto/screen-request.dto';
import { ScreeningService } from './screening.service';

@Controller()
export class ScreeningController {
  constructor(private readonly screeningService: ScreeningService) {}

  /**
   * Accepts JSON `{ job_description, resume_text }` or multipart form data
   * with a `resume` file field.
   */
  @Post('screen')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('resume'))
  async screen(
    @Body() dto: ScreenRequestDto,
    @UploadedFile() file?: Express.Multer.File,
  ): Promise<EvaluationResult> {
    return this.screeningService.screen(dto, file);
  }
}
