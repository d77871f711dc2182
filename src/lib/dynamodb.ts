/**
 * DynamoDB Client Utility - Grooming Alerts
 *
 * Centralized DynamoDB Document Client using AWS SDK v3.
 * Provides client configuration for the Lambda execution environment.
 */

import { DynamoDBClient, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, TranslateConfig } from '@aws-sdk/lib-dynamodb';

/**
 * AWS SDK v3 DynamoDB Client Configuration
 *
 * - Connection reuse via HTTP keep-alive
 * - Bounded connection/request timeouts so one slow call cannot stall a cycle
 * - Local development support via DYNAMODB_ENDPOINT
 */
const localEndpoint = process.env['DYNAMODB_ENDPOINT'];

const clientConfig: DynamoDBClientConfig = {
  region: process.env['AWS_REGION'] || 'us-west-2',
  maxAttempts: 3,
  requestHandler: {
    connectionTimeout: 3000,
    requestTimeout: 3000,
  },
  ...(localEndpoint
    ? {
        endpoint: localEndpoint,
        // Dummy credentials bypass IAM against DynamoDB Local
        credentials: { accessKeyId: 'local', secretAccessKey: 'local' },
      }
    : {}),
};

const dynamoDBClient = new DynamoDBClient(clientConfig);

/**
 * Marshalling options:
 * - removeUndefinedValues: Prevent errors from undefined attributes
 * - convertEmptyValues: Keep empty strings as-is
 */
const marshallOptions: TranslateConfig['marshallOptions'] = {
  removeUndefinedValues: true,
  convertEmptyValues: false,
};

const unmarshallOptions: TranslateConfig['unmarshallOptions'] = {
  wrapNumbers: false, // Return numbers as JavaScript numbers (not BigInt)
};

/**
 * DynamoDB Document Client instance
 *
 * Singleton pattern - reused across Lambda invocations
 */
export const docClient = DynamoDBDocumentClient.from(dynamoDBClient, {
  marshallOptions,
  unmarshallOptions,
});

/**
 * Get the DynamoDB table name from environment variable
 */
export const getTableName = (): string => {
  const tableName = process.env['TABLE_NAME'];

  if (!tableName) {
    throw new Error('TABLE_NAME environment variable is not set');
  }

  return tableName;
};
