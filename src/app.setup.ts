import { BadRequestException, INestApplication, ValidationPipe } from '@nestjs/common';
import { firstValidationMessage } from './common/helper/validation.helper';

/**
 * Settings shared by main.ts and the HTTP specs.
 */
export function configureApp<T extends INestApplication>(app: T): T {
  // preflightContinue lets the @Options handlers answer with a JSON body
  app.enableCors({
    origin: '*',
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type'],
    preflightContinue: true,
  });
  app.useGlobalPipes(
    new ValidationPipe({
      exceptionFactory: (errors) =>
        new BadRequestException({ error: firstValidationMessage(errors) }),
    }),
  );
  return app;
}
