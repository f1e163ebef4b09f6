// ============================================================================
// TENANT GATEWAY — AWS SDK v3 Client Factory
// DynamoDB document client configured with adaptive retry
// ============================================================================

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

let _dynamoClient: DynamoDBDocumentClient | null = null;

// ---------------------------------------------------------------------------
// DynamoDB
// One client per execution environment, reused across invocations
// ---------------------------------------------------------------------------
export function getDynamoClient(region: string): DynamoDBDocumentClient {
  if (_dynamoClient) return _dynamoClient;

  const rawDynamoClient = new DynamoDBClient({
    region,
    maxAttempts: 3,
    retryMode: 'adaptive',
  });

  _dynamoClient = DynamoDBDocumentClient.from(rawDynamoClient, {
    marshallOptions: {
      removeUndefinedValues: true,
      convertEmptyValues: false,
    },
    unmarshallOptions: {
      wrapNumbers: false,
    },
  });

  return _dynamoClient;
}
