/**
 * DynamoDB Client Utility - Quest Notifier
 *
 * Builds the DynamoDB Document Client (AWS SDK v3) from AppConfig.
 * Provides optimized client configuration for the Lambda execution environment.
 */

import { DynamoDBClient, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, TranslateConfig } from '@aws-sdk/lib-dynamodb';
import type { AppConfig } from '../config/app';

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
 * Create the DynamoDB Document Client
 *
 * - Short connection/request timeouts with SDK retries
 * - Local development support via DYNAMODB_ENDPOINT / AWS_SAM_LOCAL
 */
export const createDocumentClient = (aws: AppConfig['aws']): DynamoDBDocumentClient => {
  const clientConfig: DynamoDBClientConfig = {
    region: aws.region,
    maxAttempts: 3,
    requestHandler: {
      connectionTimeout: 3000,
      requestTimeout: 3000,
    },
  };

  if (aws.dynamodbEndpoint) {
    clientConfig.endpoint = aws.dynamodbEndpoint;
    clientConfig.tls = false;
  }

  // Dummy credentials bypass IAM for DynamoDB Local; this must come last
  if (aws.localDevelopment) {
    clientConfig.credentials = {
      accessKeyId: 'local',
      secretAccessKey: 'local',
    };
  }

  return DynamoDBDocumentClient.from(new DynamoDBClient(clientConfig), {
    marshallOptions,
    unmarshallOptions,
  });
};

/**
 * DynamoDB error codes the store reacts to
 */
export const DynamoDBErrorCodes = {
  RESOURCE_NOT_FOUND: 'ResourceNotFoundException',
} as const;

/**
 * Check if an error is a specific DynamoDB error
 */
export const isDynamoDBError = (error: unknown, code: string): boolean => {
  return error instanceof Error && error.name === code;
};
