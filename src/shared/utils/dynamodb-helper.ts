/**
 * DynamoDB helper utilities
 * Provides common database operations with error handling and type safety
 */

import { DynamoDB } from 'aws-sdk';
import { DocumentClient } from 'aws-sdk/clients/dynamodb';

interface AwsRequest<T> {
  promise(): Promise<T>;
}

/**
 * The subset of DocumentClient the helper relies on
 */
export interface DocumentStore {
  put(params: DocumentClient.PutItemInput): AwsRequest<DocumentClient.PutItemOutput>;
  get(params: DocumentClient.GetItemInput): AwsRequest<DocumentClient.GetItemOutput>;
  query(params: DocumentClient.QueryInput): AwsRequest<DocumentClient.QueryOutput>;
  transactWrite(params: DocumentClient.TransactWriteItemsInput): AwsRequest<DocumentClient.TransactWriteItemsOutput>;
}

export type DynamoItem = DocumentClient.AttributeMap;

export interface WriteCondition {
  expression: string;
  values?: DocumentClient.ExpressionAttributeValueMap;
}

export interface ConditionalPut {
  tableName: string;
  item: DynamoItem;
  condition?: WriteCondition;
}

/**
 * A write refused by its condition expression; the item changed underneath the caller
 */
export class ConditionalWriteError extends Error {
  constructor(tableName: string) {
    super(`Conditional write to ${tableName} was rejected`);
    this.name = 'ConditionalWriteError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isConditionFailure(error: unknown): boolean {
  const code = errorCode(error);
  if (code === 'ConditionalCheckFailedException') {
    return true;
  }
  // Cancellation reasons only surface in the message with the v2 client
  return code === 'TransactionCanceledException' && errorMessage(error).includes('ConditionalCheckFailed');
}

function withCreatedAt(item: DynamoItem): DynamoItem {
  return {
    ...item,
    createdAt: item.createdAt || new Date().toISOString(),
  };
}

export class DynamoDBHelper {
  private docClient: DocumentStore;

  constructor(docClient?: DocumentStore) {
    this.docClient = docClient ?? new DynamoDB.DocumentClient({
      region: process.env.AWS_REGION || 'ap-south-1',
    });
  }

  /**
   * Put an item into a DynamoDB table
   */
  async putItem(tableName: string, item: DynamoItem, condition?: WriteCondition): Promise<void> {
    const params: DocumentClient.PutItemInput = {
      TableName: tableName,
      Item: withCreatedAt(item),
      ConditionExpression: condition?.expression,
      ExpressionAttributeValues: condition?.values,
    };

    try {
      await this.docClient.put(params).promise();
    } catch (error) {
      if (isConditionFailure(error)) {
        throw new ConditionalWriteError(tableName);
      }
      throw new Error(`Failed to put item to ${tableName}: ${errorMessage(error)}`);
    }
  }

  /**
   * Get an item from a DynamoDB table
   */
  async getItem(tableName: string, key: DocumentClient.Key): Promise<DynamoItem | null> {
    const params: DocumentClient.GetItemInput = {
      TableName: tableName,
      Key: key,
    };

    try {
      const result = await this.docClient.get(params).promise();
      return result.Item || null;
    } catch (error) {
      throw new Error(`Failed to get item from ${tableName}: ${errorMessage(error)}`);
    }
  }

  /**
   * Query items from a DynamoDB table
   */
  async queryItems(
    tableName: string,
    keyConditionExpression: string,
    expressionAttributeValues: DocumentClient.ExpressionAttributeValueMap,
    limit?: number,
    scanIndexForward?: boolean
  ): Promise<DynamoItem[]> {
    const params: DocumentClient.QueryInput = {
      TableName: tableName,
      KeyConditionExpression: keyConditionExpression,
      ExpressionAttributeValues: expressionAttributeValues,
      Limit: limit,
      ScanIndexForward: scanIndexForward,
    };

    try {
      const result = await this.docClient.query(params).promise();
      return result.Items || [];
    } catch (error) {
      throw new Error(`Failed to query items from ${tableName}: ${errorMessage(error)}`);
    }
  }

  /**
   * Write several items atomically; either every put lands or none does
   */
  async transactWriteItems(puts: ConditionalPut[]): Promise<void> {
    const params: DocumentClient.TransactWriteItemsInput = {
      TransactItems: puts.map(({ tableName, item, condition }) => ({
        Put: {
          TableName: tableName,
          Item: withCreatedAt(item),
          ConditionExpression: condition?.expression,
          ExpressionAttributeValues: condition?.values,
        },
      })),
    };
    const tables = [...new Set(puts.map(put => put.tableName))].join(', ');

    try {
      await this.docClient.transactWrite(params).promise();
    } catch (error) {
      if (isConditionFailure(error)) {
        throw new ConditionalWriteError(tables);
      }
      throw new Error(`Failed to write transaction to ${tables}: ${errorMessage(error)}`);
    }
  }
}
