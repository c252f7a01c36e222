import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

const instantStatusProperties = {
  lastAssignedToName: { type: 'string', nullable: true },
  lastAssignedToJobCode: { type: 'string', nullable: true },
  lastAssignedByName: { type: 'string', nullable: true },
  lastAssignedAt: { type: 'string', format: 'date-time', nullable: true },
  lastCheckinAt: { type: 'string', format: 'date-time', nullable: true },
  lastCheckinByName: { type: 'string', nullable: true },
};

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Tool Custody API',
      version: '1.0.0',
      description: `
Check-out/check-in engine for workshop tools and consumables.

## Custody model
- Each tool document carries its current holder and the instant-status fields of the
  latest custody change, so status reads never touch the history ledgers.
- Item and staff documents change together in one optimistic transaction; a tool can
  only be checked out once at a time.
- History is appended afterwards, best effort, to a per-item ledger (one bucket per
  month, \`MM-YYYY\`) and a global ledger (one bucket per day, \`YYYY/MM/DD\`).

## Batches
A batch groups scanned items into one operation of a single type. Submission reports
every item; \`207\` means some or all items failed.

Transactions retry up to ${env.TRANSACTION_MAX_ATTEMPTS} times before answering
\`TRANSACTION_CONFLICT\` (safe to retry).
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: 'Development server',
      },
    ],
    tags: [
      { name: 'Custody', description: 'Checkout, checkin, usage and restock' },
      { name: 'Items', description: 'Item status' },
      { name: 'History', description: 'History ledger queries' },
      { name: 'Staff', description: 'Staff assignments' },
      { name: 'Batches', description: 'Batch scanning and submission' },
      { name: 'System', description: 'Health' },
    ],
    components: {
      parameters: {
        HistoryStart: {
          in: 'query',
          name: 'start',
          description: `Range start; defaults to ${env.HISTORY_DEFAULT_LOOKBACK_DAYS} days before end`,
          schema: { type: 'string', format: 'date-time' },
        },
        HistoryEnd: {
          in: 'query',
          name: 'end',
          description: 'Range end; defaults to now',
          schema: { type: 'string', format: 'date-time' },
        },
        HistoryLimit: {
          in: 'query',
          name: 'limit',
          schema: { type: 'integer', minimum: 1, maximum: 1000, default: env.HISTORY_DEFAULT_LIMIT },
        },
      },
      schemas: {
        Item: {
          type: 'object',
          properties: {
            id: { type: 'string' },
            kind: { type: 'string', enum: ['tool', 'consumable'] },
            uniqueId: { type: 'string', example: 'T1234' },
            name: { type: 'string' },
            brand: { type: 'string' },
            model: { type: 'string', description: 'Tools only' },
            status: { type: 'string', enum: ['available', 'checked_out'], description: 'Tools only' },
            currentHolderUid: { type: 'string', nullable: true, description: 'Tools only' },
            unit: { type: 'string', description: 'Consumables only' },
            currentQuantity: { type: 'number', description: 'Consumables only' },
            minQuantity: { type: 'number', description: 'Consumables only' },
            ...instantStatusProperties,
            updatedAt: { type: 'string', format: 'date-time', nullable: true },
          },
        },
        HistoryEntry: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            action: { type: 'string', enum: ['checkout', 'checkin', 'usage', 'restock'] },
            itemId: { type: 'string' },
            itemUniqueId: { type: 'string' },
            itemKind: { type: 'string', enum: ['tool', 'consumable'] },
            byStaffUid: { type: 'string' },
            assignedToStaffUid: { type: 'string', nullable: true },
            batchId: { type: 'string', nullable: true },
            notes: { type: 'string', nullable: true },
            timestamp: { type: 'string', format: 'date-time' },
            quantity: {
              type: 'object',
              nullable: true,
              properties: {
                before: { type: 'number' },
                change: { type: 'number' },
                after: { type: 'number' },
              },
            },
            metadata: {
              type: 'object',
              properties: {
                staffName: { type: 'string' },
                staffJobCode: { type: 'string' },
                itemName: { type: 'string' },
                itemBrand: { type: 'string' },
                itemModel: { type: 'string' },
                adminName: { type: 'string' },
              },
            },
          },
        },
        CustodyChange: {
          type: 'object',
          properties: {
            item: { $ref: '#/components/schemas/Item' },
            entry: { $ref: '#/components/schemas/HistoryEntry' },
          },
        },
        Batch: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            state: {
              type: 'string',
              enum: ['empty', 'checkout', 'checkin', 'consumable_usage', 'consumable_restock'],
            },
            items: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  itemId: { type: 'string' },
                  uniqueId: { type: 'string' },
                  kind: { type: 'string' },
                  quantity: { type: 'number', nullable: true },
                },
              },
            },
            submitting: { type: 'boolean' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        BatchReport: {
          type: 'object',
          properties: {
            batchId: { type: 'string', example: 'BATCH_5f0c6a1e-2b7d-4c89-9a51-1c2f3e4d5a6b' },
            type: { type: 'string' },
            status: { type: 'string', enum: ['completed', 'partial', 'failed'] },
            total: { type: 'integer' },
            succeeded: { type: 'array', items: { type: 'object' } },
            failed: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  itemId: { type: 'string' },
                  uniqueId: { type: 'string' },
                  code: { type: 'string' },
                  category: { type: 'string' },
                  message: { type: 'string' },
                },
              },
            },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', description: 'Error code' },
                message: { type: 'string', description: 'Human-readable error message' },
                details: { type: 'object', description: 'Additional error details' },
              },
            },
          },
        },
      },
    },
  },
  // Route files with JSDoc comments (sources under tsx, compiled files under dist)
  apis: [path.join(__dirname, '../routes/**/*.ts'), path.join(__dirname, '../routes/**/*.js')],
};

export const swaggerSpec = swaggerJsdoc(options);
