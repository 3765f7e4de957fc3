import * as cdk from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import { DEFAULT_VALUES, EVENT_TYPES, TABLE_NAMES } from '../src/shared/config/constants';

export interface SoilHealthStackProps extends cdk.StackProps {
  stage?: 'development' | 'staging' | 'production';
  /** Compiled output holding src/ (tsc outDir) */
  assetPath?: string;
  /** Overrides assetPath, e.g. inline code when synthesizing in tests */
  code?: lambda.Code;
  thingSpeakChannelId?: string;
  thingSpeakFieldId?: string;
  /** Minutes between ThingSpeak pulls */
  collectionIntervalMinutes?: number;
}

export class SoilHealthStack extends cdk.Stack {
  // DynamoDB Tables
  public readonly historyTable: dynamodb.Table;
  public readonly fieldStagesTable: dynamodb.Table;

  // EventBridge
  public readonly eventBus: events.EventBus;

  // Lambda Functions
  public readonly apiFunctions: Record<string, lambda.Function>;
  public readonly thingSpeakCollectionFunction: lambda.Function;
  public readonly sensorSimulatorFunction: lambda.Function;

  public readonly api: apigateway.RestApi;

  private readonly code: lambda.Code;
  private readonly stage: string;

  constructor(scope: Construct, id: string, props: SoilHealthStackProps = {}) {
    super(scope, id, props);

    this.stage = props.stage ?? 'development';
    this.code = props.code ?? lambda.Code.fromAsset(props.assetPath ?? 'dist');

    // Field history: one partition per field, score and recommendation items sorted by time
    this.historyTable = new dynamodb.Table(this, 'SoilHealthHistoryTable', {
      tableName: TABLE_NAMES.SOIL_HEALTH_HISTORY,
      partitionKey: {
        name: 'fieldId',
        type: dynamodb.AttributeType.STRING,
      },
      sortKey: {
        name: 'recordKey',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      pointInTimeRecovery: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.fieldStagesTable = new dynamodb.Table(this, 'FieldStagesTable', {
      tableName: TABLE_NAMES.FIELD_STAGES,
      partitionKey: {
        name: 'fieldId',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.eventBus = new events.EventBus(this, 'SoilHealthEventBus', {
      eventBusName: DEFAULT_VALUES.EVENT_BUS_NAME,
    });

    this.apiFunctions = {
      ingestReading: this.createFunction('IngestReadingFunction', 'src/interaction-layer/soil-health-api.ingestReading', {}),
      getFieldHistory: this.createFunction('GetFieldHistoryFunction', 'src/interaction-layer/soil-health-api.getFieldHistory', {}),
      getFieldTrend: this.createFunction('GetFieldTrendFunction', 'src/interaction-layer/soil-health-api.getFieldTrend', {}),
      setFieldStage: this.createFunction('SetFieldStageFunction', 'src/interaction-layer/soil-health-api.setFieldStage', {}),
    };

    this.thingSpeakCollectionFunction = this.createFunction(
      'ThingSpeakCollectionFunction',
      'src/data-ingestion/thingspeak-collection.handler',
      {
        THINGSPEAK_CHANNEL_ID: props.thingSpeakChannelId ?? '',
        THINGSPEAK_FIELD_ID: props.thingSpeakFieldId ?? '',
      }
    );

    this.sensorSimulatorFunction = this.createFunction(
      'SensorSimulatorFunction',
      'src/data-ingestion/sensor-simulator.handler',
      {}
    );

    this.api = this.createApi();

    if (props.thingSpeakChannelId) {
      this.createCollectionSchedule(props.collectionIntervalMinutes ?? 15);
    }

    this.createOutputs();
  }

  private createFunction(id: string, handler: string, extraEnvironment: Record<string, string>): lambda.Function {
    const fn = new lambda.Function(this, id, {
      runtime: lambda.Runtime.NODEJS_20_X,
      handler,
      code: this.code,
      timeout: cdk.Duration.seconds(30),
      memorySize: 512,
      environment: {
        // DynamoDB Tables
        HISTORY_TABLE_NAME: this.historyTable.tableName,
        FIELD_STAGES_TABLE_NAME: this.fieldStagesTable.tableName,

        // EventBridge
        EVENT_BUS_NAME: this.eventBus.eventBusName,

        // Application Settings
        LOG_LEVEL: 'INFO',
        STAGE: this.stage,

        // History
        HISTORY_WINDOW: String(DEFAULT_VALUES.HISTORY_WINDOW),
        HISTORY_RETENTION: String(DEFAULT_VALUES.HISTORY_RETENTION),
        ...extraEnvironment,
      },
      logRetention: logs.RetentionDays.ONE_MONTH,
    });

    this.historyTable.grantReadWriteData(fn);
    this.fieldStagesTable.grantReadWriteData(fn);
    this.eventBus.grantPutEventsTo(fn);

    return fn;
  }

  private createApi(): apigateway.RestApi {
    const api = new apigateway.RestApi(this, 'SoilHealthApi', {
      restApiName: 'SoilHealth-Api',
      description: 'Soil health scoring and fertilizer recommendations',
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      },
    });

    const field = api.root.addResource('fields').addResource('{fieldId}');
    field.addResource('readings').addMethod('POST', new apigateway.LambdaIntegration(this.apiFunctions.ingestReading));
    field.addResource('history').addMethod('GET', new apigateway.LambdaIntegration(this.apiFunctions.getFieldHistory));
    field.addResource('trend').addMethod('GET', new apigateway.LambdaIntegration(this.apiFunctions.getFieldTrend));
    field.addResource('stage').addMethod('PUT', new apigateway.LambdaIntegration(this.apiFunctions.setFieldStage));

    return api;
  }

  private createCollectionSchedule(intervalMinutes: number): void {
    const collectionRule = new events.Rule(this, 'ThingSpeakCollectionSchedule', {
      ruleName: 'SoilHealth-ThingSpeakCollection-Schedule',
      description: `Pulls the latest ThingSpeak soil sample every ${intervalMinutes} minutes`,
      schedule: events.Schedule.rate(cdk.Duration.minutes(intervalMinutes)),
    });

    collectionRule.addTarget(new targets.LambdaFunction(this.thingSpeakCollectionFunction));

    // Assessments land on the custom bus; keep a copy for troubleshooting
    const assessmentLogGroup = new logs.LogGroup(this, 'AssessmentEventLogGroup', {
      logGroupName: '/aws/events/soil-health',
      retention: logs.RetentionDays.ONE_MONTH,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    new events.Rule(this, 'AssessmentArchiveRule', {
      eventBus: this.eventBus,
      eventPattern: {
        source: [EVENT_TYPES.SOURCE],
        detailType: [EVENT_TYPES.SOIL_HEALTH_ASSESSED],
      },
      targets: [new targets.CloudWatchLogGroup(assessmentLogGroup)],
    });
  }

  private createOutputs(): void {
    new cdk.CfnOutput(this, 'HistoryTableName', {
      value: this.historyTable.tableName,
      description: 'Name of the soil health history DynamoDB table',
    });

    new cdk.CfnOutput(this, 'FieldStagesTableName', {
      value: this.fieldStagesTable.tableName,
      description: 'Name of the field growth stage DynamoDB table',
    });

    new cdk.CfnOutput(this, 'EventBusName', {
      value: this.eventBus.eventBusName,
      description: 'Name of the soil health EventBridge event bus',
    });

    new cdk.CfnOutput(this, 'ApiUrl', {
      value: this.api.url,
      description: 'Base URL of the soil health API',
    });
  }
}
