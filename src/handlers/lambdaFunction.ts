import {
  LambdaClient,
  DeleteFunctionCommand,
  GetFunctionConfigurationCommand,
} from '@aws-sdk/client-lambda';
import { isNotFoundError } from '@shared/errors';
import type { ServerlessFunctionRecord } from '@shared/types';
import { BaseDeletionHandler } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['ResourceNotFoundException'];

/**
 * Serverless function handler. The backup exports the function configuration;
 * the deployment package itself is not copied.
 */
export class LambdaFunctionHandler extends BaseDeletionHandler<ServerlessFunctionRecord> {
  private lambdaClient: LambdaClient;

  constructor(record: ServerlessFunctionRecord, context: HandlerContext) {
    super(record, context);
    this.lambdaClient = new LambdaClient({ region: record.region });
  }

  async readState(): Promise<string | undefined> {
    try {
      const configuration = await this.lambdaClient.send(
        new GetFunctionConfigurationCommand({ FunctionName: this.record.id })
      );
      // Functions created before state tracking report no State.
      return configuration.State?.toLowerCase() ?? 'active';
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const response = await this.lambdaClient.send(
      new GetFunctionConfigurationCommand({ FunctionName: this.record.id })
    );
    return { configuration: { ...response, $metadata: undefined } };
  }

  async destroy(): Promise<void> {
    await this.lambdaClient.send(new DeleteFunctionCommand({ FunctionName: this.record.id }));
    this.logger.info({ functionName: this.record.id }, 'Function deleted');
  }
}
