import { DocumentClient } from 'aws-sdk/clients/dynamodb';
import { EventBridge } from 'aws-sdk';
import { DocumentStore, DynamoItem } from '../src/shared/utils/dynamodb-helper';
import { EventPublisher } from '../src/soil-health-engine/soil-health-service';

function request<T>(value: T): { promise(): Promise<T> } {
  return { promise: () => Promise.resolve(value) };
}

function rejected<T>(error: Error): { promise(): Promise<T> } {
  return { promise: () => Promise.reject(error) };
}

function awsError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

function sameKey(a: DynamoItem, b: DynamoItem): boolean {
  return a.fieldId === b.fieldId && a.recordKey === b.recordKey;
}

/**
 * Evaluates the condition forms the repository writes:
 * `attribute_not_exists(a)`, `a = :v` and `a <= :v`, joined by OR
 */
function conditionHolds(
  existing: DynamoItem | undefined,
  expression: string,
  values: DocumentClient.ExpressionAttributeValueMap = {}
): boolean {
  return expression.split(' OR ').some(clause => {
    const notExists = /^attribute_not_exists\((\w+)\)$/.exec(clause.trim());
    if (notExists) {
      return existing === undefined || existing[notExists[1]] === undefined;
    }

    const comparison = /^(\w+) (=|<=) (:\w+)$/.exec(clause.trim());
    if (!comparison) {
      throw new Error(`Unsupported condition: ${clause}`);
    }
    const [, attribute, operator, placeholder] = comparison;
    const actual: unknown = existing?.[attribute];
    const expected: unknown = values[placeholder];
    if (typeof actual !== 'number' || typeof expected !== 'number') {
      return false;
    }
    return operator === '=' ? actual === expected : actual <= expected;
  });
}

/**
 * DocumentClient stand-in keyed on fieldId (+ recordKey); understands the
 * `fieldId = :fieldId AND begins_with(recordKey, :prefix)` query the repository issues
 */
export class InMemoryDocumentStore implements DocumentStore {
  readonly tables = new Map<string, DynamoItem[]>();
  /** Rejects the next put or transaction with this error, writing nothing */
  failNextWrite?: Error;
  /** Runs before each transaction is checked, to let a test write in between */
  beforeTransaction?: () => void;

  items(tableName: string): DynamoItem[] {
    return this.tables.get(tableName) ?? [];
  }

  put(params: DocumentClient.PutItemInput) {
    const failure = this.takeFailure();
    if (failure) {
      return rejected<DocumentClient.PutItemOutput>(failure);
    }
    if (params.ConditionExpression && !this.holds(params.TableName, params.Item, params.ConditionExpression, params.ExpressionAttributeValues)) {
      return rejected<DocumentClient.PutItemOutput>(
        awsError('ConditionalCheckFailedException', 'The conditional request failed')
      );
    }
    this.upsert(params.TableName, params.Item);
    return request<DocumentClient.PutItemOutput>({});
  }

  get(params: DocumentClient.GetItemInput) {
    const item = this.items(params.TableName).find(candidate => sameKey(candidate, params.Key));
    return request<DocumentClient.GetItemOutput>(item ? { Item: { ...item } } : {});
  }

  query(params: DocumentClient.QueryInput) {
    const values = params.ExpressionAttributeValues ?? {};
    const fieldId: unknown = values[':fieldId'];
    const prefix: unknown = values[':prefix'];

    const matches = this.items(params.TableName)
      .filter(item => item.fieldId === fieldId)
      .filter(item => typeof prefix !== 'string' || String(item.recordKey).startsWith(prefix))
      .sort((a, b) => String(a.recordKey).localeCompare(String(b.recordKey)));
    if (params.ScanIndexForward === false) {
      matches.reverse();
    }

    const limited = params.Limit === undefined ? matches : matches.slice(0, params.Limit);
    return request<DocumentClient.QueryOutput>({ Items: limited.map(item => ({ ...item })) });
  }

  transactWrite(params: DocumentClient.TransactWriteItemsInput) {
    this.beforeTransaction?.();
    const failure = this.takeFailure();
    if (failure) {
      return rejected<DocumentClient.TransactWriteItemsOutput>(failure);
    }

    const puts = params.TransactItems.flatMap(write => (write.Put ? [write.Put] : []));
    const reasons = puts.map(put =>
      !put.ConditionExpression || this.holds(put.TableName, put.Item, put.ConditionExpression, put.ExpressionAttributeValues)
        ? 'None'
        : 'ConditionalCheckFailed'
    );
    if (reasons.includes('ConditionalCheckFailed')) {
      return rejected<DocumentClient.TransactWriteItemsOutput>(awsError(
        'TransactionCanceledException',
        `Transaction cancelled, please refer cancellation reasons for specific reasons [${reasons.join(', ')}]`
      ));
    }

    for (const put of puts) {
      this.upsert(put.TableName, put.Item);
    }
    return request<DocumentClient.TransactWriteItemsOutput>({});
  }

  private takeFailure(): Error | undefined {
    const failure = this.failNextWrite;
    this.failNextWrite = undefined;
    return failure;
  }

  private holds(
    tableName: string,
    item: DynamoItem,
    expression: string,
    values?: DocumentClient.ExpressionAttributeValueMap
  ): boolean {
    const existing = this.items(tableName).find(candidate => sameKey(candidate, item));
    return conditionHolds(existing, expression, values);
  }

  private upsert(tableName: string, item: DynamoItem): void {
    const table = this.items(tableName).filter(existing => !sameKey(existing, item));
    table.push({ ...item });
    this.tables.set(tableName, table);
  }
}

export class RecordingEventPublisher implements EventPublisher {
  readonly requests: EventBridge.PutEventsRequest[] = [];
  failWith?: Error;
  /** Entries the bus reports as failed instead of throwing */
  rejectEntries = false;

  putEvents(params: EventBridge.PutEventsRequest) {
    if (this.failWith) {
      return rejected<EventBridge.PutEventsResponse>(this.failWith);
    }
    this.requests.push(params);
    if (this.rejectEntries) {
      return request<EventBridge.PutEventsResponse>({
        FailedEntryCount: params.Entries.length,
        Entries: params.Entries.map(() => ({ ErrorCode: 'InternalFailure', ErrorMessage: 'test failure' }))
      });
    }
    return request<EventBridge.PutEventsResponse>({ FailedEntryCount: 0, Entries: [] });
  }
}
