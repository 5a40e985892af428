import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Blog API',
      version: '1.0.0',
      description: 'REST API for a blog: accounts, posts and comments',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'FORBIDDEN',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Not allowed to update this resource',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration, login and tokens' },
      { name: 'Posts', description: 'Blog posts' },
      { name: 'Comments', description: 'Comments on posts' },
      { name: 'Admin', description: 'User administration' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
