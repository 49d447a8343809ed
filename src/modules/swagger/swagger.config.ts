import { DocumentBuilder, OpenAPIObject, SwaggerCustomOptions } from '@nestjs/swagger';

/**
 * OpenAPI configuration, mounted by main.ts at /api/docs.
 */
export function buildSwaggerConfig(): Omit<OpenAPIObject, 'paths'> {
  return new DocumentBuilder()
    .setTitle('Incidencias API')
    .setDescription(
      'Incident ticketing service for campus facilities. ' +
      'All endpoints except /health require a JWT Bearer token issued by the identity service.',
    )
    .setVersion('1.0.0')
    .setLicense('MIT', 'https://opensource.org/licenses/MIT')
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'JWT access token carrying sub and role claims',
      },
      'JWT-auth',
    )
    .addTag('Incidencias', 'Filing, triage, assignment and state transitions')
    .addTag('Comentarios', 'Public and internal comments on an incidencia')
    .addTag('Adjuntos', 'Attachment metadata for an incidencia')
    .addTag('Catalogos', 'States, priorities and categories')
    .addTag('Health', 'Liveness and database readiness')
    .build();
}

export const swaggerCustomOptions: SwaggerCustomOptions = {
  swaggerOptions: {
    persistAuthorization: true,
    tagsSorter: 'alpha',
    operationsSorter: 'method',
    docExpansion: 'none',
    filter: true,
  },
  customSiteTitle: 'Incidencias API Documentation',
  customCss: '.swagger-ui .topbar { display: none }',
};
