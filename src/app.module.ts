import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { AnalysisModule } from './analysis/analysis.module';

@Module({
  imports: [ConfigModule, AnalysisModule],
  controllers: [AppController],
})
export class AppModule {}
