import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { AIModule } from '../ai/ai.module';
import { AppConfig } from '../config/configuration';
import { DocumentsModule } from '../documents/documents.module';
import { ScreeningController } from './screening.controller';
import { ScreeningService } from './screening.service';

@Module({
  imports: [
    MulterModule.registerAsync({
      useFactory: (configService: ConfigService) => {
        const config = configService.get<AppConfig>('app');
        return {
          limits: {
            fileSize: config?.upload.maxFileSize || 10485760, // 10MB
            files: 1,
          },
        };
      },
      inject: [ConfigService],
    }),
    DocumentsModule,
    AIModule,
  ],
  controllers: [ScreeningController],
  providers: [ScreeningService],
})
export class ScreeningModule {}
