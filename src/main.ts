import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { appConfig, AppConfigType } from './config/configuration';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function logLevelsFrom(level: string): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(0, index < 0 ? 3 : index + 1);
}

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      abortOnError: false,
    });
    const config = app.get<AppConfigType>(appConfig.KEY);
    app.useLogger(logLevelsFrom(config.logLevel));

    // Loops are stopped from OnApplicationShutdown
    app.enableShutdownHooks();
    app.enableCors();

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        transformOptions: {
          enableImplicitConversion: true,
        },
      }),
    );

    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Spot Arbitrage Bot API')
        .setDescription('Two-venue spot arbitrage: quotes, one-off passes, loops and trade history')
        .setVersion('1.0')
        .addTag('arbitrage', 'Arbitrage operations')
        .build(),
    );
    SwaggerModule.setup('api', app, document);

    await app.listen(config.port);

    logger.log(`🚀 Spot Arbitrage Bot is running on port ${config.port}`);
    logger.log(`📊 Environment: ${config.environment}, symbol ${config.trading.symbol}`);
    logger.log(`📚 API Documentation available at http://localhost:${config.port}/api`);
  } catch (error) {
    logger.error('❌ Failed to start application', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

bootstrap();
