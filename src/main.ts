import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  const config = app.get(ConfigService);

  app.enableCors({
    origin: config.get<string>('CORS_ORIGINS')?.split(',') ?? false,
  });

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Assistant NLU')
    .setDescription(
      'Korean intent classification, entity extraction and calendar request building',
    )
    .setVersion('0.1.0')
    .build();
  SwaggerModule.setup(
    'api',
    app,
    SwaggerModule.createDocument(app, swaggerConfig),
  );

  const port = Number(config.get('PORT') ?? 3000);
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on port ${port}`);
}
void bootstrap();
