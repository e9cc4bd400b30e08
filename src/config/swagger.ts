import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

export const buildSwaggerSpec = (): object => swaggerJsdoc({
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Carabid Count Reconciliation API',
      version: '1.0.0',
      description: 'Trap-level carabid beetle counts reconciled across sorting, pinning and expert identification',
    },
  },
  apis: [path.join(__dirname, '../routes/*.ts'), path.join(__dirname, '../routes/*.js')],
});

export default buildSwaggerSpec;
