import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { useContainer } from 'class-validator';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { configureApp } from './utils/configure-app';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  useContainer(app.select(AppModule), { fallbackOnErrors: true });
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = new Logger('Bootstrap');

  // TODO: Tighten the CSP once Swagger UI is served from a separate host
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'"], // Swagger UI
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"],
        },
      },
      hsts: {
        maxAge: 31536000,
        includeSubDomains: true,
      },
      noSniff: true,
    }),
  );

  app.enableShutdownHooks();
  configureApp(app, configService.getOrThrow('app.apiPrefix', { infer: true }));

  const enableSwagger = process.env.SWAGGER_ENABLED !== 'false';

  if (enableSwagger) {
    const options = new DocumentBuilder()
      .setTitle('DocShare Core API')
      .setDescription(
        'Versioned document storage with role-based sharing and activity history',
      )
      .setVersion('1.0')
      .addBearerAuth()
      .build();

    const document = SwaggerModule.createDocument(app, options);
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: {
        persistAuthorization: true,
      },
    });

    logger.log(
      `Swagger documentation available at http://localhost:${configService.get('app.port', { infer: true })}/docs`,
    );
  }

  await app.listen(configService.getOrThrow('app.port', { infer: true }));
}
void bootstrap();
