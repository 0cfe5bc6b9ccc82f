/**
 * CloudFormation Manager
 * Converges the site stack to a template and parameter set: create, update or no-op
 */

import {
  CreateStackCommand,
  DescribeStackEventsCommand,
  DescribeStacksCommand,
  UpdateStackCommand,
  ValidateTemplateCommand,
  Capability,
  StackStatus,
  type Stack,
  type StackEvent,
} from '@aws-sdk/client-cloudformation';
import type { Ora } from 'ora';
import type { DeployContext } from '../context.js';
import { StackCreateError, StackTimeoutError, StackUpdateError } from '../errors.js';
import { done, pending, pollUntil, PollTimeoutError } from '../utils/poll.js';
import { AWS_RETRYABLE_ERRORS, withRetry } from '../utils/retry.js';
import { startSpinner } from '../utils/spinner.js';
import type {
  DurationBound,
  StackDeployment,
  StackEventSummary,
  StackStatus as DeploymentStatus,
} from '../../types/deployment.js';

const STACK_CAPABILITIES = [Capability.CAPABILITY_NAMED_IAM, Capability.CAPABILITY_AUTO_EXPAND];

const NO_UPDATES_MESSAGE = 'No updates are to be performed';

/**
 * Statuses UpdateStack refuses; the stack has to be deleted by hand
 */
const NON_UPDATABLE_STATUSES: ReadonlySet<string> = new Set([
  StackStatus.ROLLBACK_COMPLETE,
  StackStatus.ROLLBACK_FAILED,
  StackStatus.CREATE_FAILED,
  StackStatus.DELETE_FAILED,
  StackStatus.UPDATE_ROLLBACK_FAILED,
  StackStatus.REVIEW_IN_PROGRESS,
]);

/**
 * Stack-level events that open a create or update operation
 */
const OPERATION_START_STATUSES: ReadonlySet<string> = new Set([
  StackStatus.CREATE_IN_PROGRESS,
  StackStatus.UPDATE_IN_PROGRESS,
]);

const MAX_EVENT_PAGES = 10;

type StackOperation = 'create' | 'update';

/**
 * Stack as seen by the last poll; null once it is gone
 */
interface StackSnapshot {
  stack: Stack | null;
  status: string;
}

export interface CloudFormationManagerOptions {
  /** Bound for every stack wait */
  polling: DurationBound;

  /** Tags put on the stack (and propagated to its resources) */
  tags?: Record<string, string>;
}

/**
 * A stack operation is running (REVIEW_IN_PROGRESS waits for a change set, not for time)
 */
export function isInProgress(status: string): boolean {
  return status.endsWith('_IN_PROGRESS') && status !== StackStatus.REVIEW_IN_PROGRESS;
}

/**
 * CloudFormation Manager for stack convergence
 */
export class CloudFormationManager {
  constructor(
    private readonly context: DeployContext,
    private readonly options: CloudFormationManagerOptions
  ) {}

  /**
   * Bring `stackName` to the given template and parameters.
   *
   * With `validateOnly` only the template is validated; nothing is read from or
   * written to the stack.
   */
  async converge(
    stackName: string,
    templateBody: string,
    parameters: Record<string, string>,
    validateOnly: boolean
  ): Promise<StackDeployment> {
    if (validateOnly) {
      await this.validateTemplate(templateBody);
      return { stackName, parameters, status: 'VALIDATED', outputs: {} };
    }

    let existing = await this.describeStack(stackName);

    if (existing && isInProgress(existing.StackStatus ?? '')) {
      existing = await this.waitForSettled(stackName);
    }

    if (!existing) {
      const stack = await this.createStack(stackName, templateBody, parameters);
      return this.toDeployment(stackName, parameters, 'CREATE_COMPLETE', stack);
    }

    const status = existing.StackStatus ?? 'UNKNOWN';
    if (NON_UPDATABLE_STATUSES.has(status)) {
      throw new StackUpdateError(
        stackName,
        status,
        [],
        `the stack cannot be updated in this state. Delete it (aws cloudformation delete-stack --stack-name ${stackName}) and deploy again`
      );
    }

    const updated = await this.updateStack(stackName, templateBody, parameters);
    if (!updated) {
      return this.toDeployment(stackName, parameters, 'NO_CHANGES', existing);
    }
    return this.toDeployment(stackName, parameters, 'UPDATE_COMPLETE', updated);
  }

  /**
   * Validate a template body without touching any stack
   */
  async validateTemplate(templateBody: string): Promise<void> {
    const spinner = startSpinner('Validating CloudFormation template...', this.context.showProgress);

    try {
      await this.context.clients.cloudFormation.send(
        new ValidateTemplateCommand({ TemplateBody: templateBody })
      );
      spinner.succeed('Template is valid');
    } catch (error) {
      spinner.fail('Template validation failed');
      throw error;
    }
  }

  /**
   * Describe the stack, or null when it does not exist
   */
  async describeStack(stackName: string): Promise<Stack | null> {
    try {
      const response = await withRetry(
        () => this.context.clients.cloudFormation.send(new DescribeStacksCommand({ StackName: stackName })),
        {
          retryableErrors: [...AWS_RETRYABLE_ERRORS.CloudFormation, ...AWS_RETRYABLE_ERRORS.General],
          clock: this.context.clock,
          signal: this.context.signal,
        }
      );
      const stack = response.Stacks?.[0];
      if (!stack || stack.StackStatus === StackStatus.DELETE_COMPLETE) {
        return null;
      }
      return stack;
    } catch (error) {
      if (error instanceof Error && error.message.includes('does not exist')) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Failed resource events of the latest operation, oldest first
   */
  async getFailedEvents(stackName: string): Promise<StackEventSummary[]> {
    const failures: StackEventSummary[] = [];
    let nextToken: string | undefined;
    let pages = 0;

    // Events come newest first; stop at the event that opened the operation
    do {
      const response = await this.context.clients.cloudFormation.send(
        new DescribeStackEventsCommand({ StackName: stackName, NextToken: nextToken })
      );

      for (const event of response.StackEvents ?? []) {
        if (isOperationStart(event, stackName)) {
          return failures.reverse();
        }
        if (event.ResourceStatus?.endsWith('_FAILED') && !isStackEvent(event, stackName)) {
          failures.push({
            logicalResourceId: event.LogicalResourceId ?? 'unknown',
            resourceType: event.ResourceType ?? 'unknown',
            status: event.ResourceStatus,
            reason: event.ResourceStatusReason,
          });
        }
      }

      nextToken = response.NextToken;
      pages++;
    } while (nextToken && pages < MAX_EVENT_PAGES);

    return failures.reverse();
  }

  private async createStack(
    stackName: string,
    templateBody: string,
    parameters: Record<string, string>
  ): Promise<Stack> {
    const spinner = startSpinner(`Creating stack ${stackName}...`, this.context.showProgress);

    try {
      await this.context.clients.cloudFormation.send(
        new CreateStackCommand({
          StackName: stackName,
          TemplateBody: templateBody,
          Parameters: toParameters(parameters),
          Capabilities: STACK_CAPABILITIES,
          Tags: this.stackTags(),
        })
      );
    } catch (error) {
      spinner.fail(`Failed to create stack ${stackName}`);
      throw error;
    }

    spinner.text = `Waiting for stack ${stackName} to be created...`;
    return this.waitForOperation(stackName, 'create', spinner);
  }

  /**
   * Returns null when CloudFormation reports nothing to update
   */
  private async updateStack(
    stackName: string,
    templateBody: string,
    parameters: Record<string, string>
  ): Promise<Stack | null> {
    const spinner = startSpinner(`Updating stack ${stackName}...`, this.context.showProgress);

    try {
      await this.context.clients.cloudFormation.send(
        new UpdateStackCommand({
          StackName: stackName,
          TemplateBody: templateBody,
          Parameters: toParameters(parameters),
          Capabilities: STACK_CAPABILITIES,
          Tags: this.stackTags(),
        })
      );
    } catch (error) {
      if (error instanceof Error && error.message.includes(NO_UPDATES_MESSAGE)) {
        spinner.succeed(`Stack ${stackName} is up to date`);
        return null;
      }
      spinner.fail(`Failed to update stack ${stackName}`);
      throw error;
    }

    spinner.text = `Waiting for stack ${stackName} to be updated...`;
    return this.waitForOperation(stackName, 'update', spinner);
  }

  private async waitForOperation(
    stackName: string,
    operation: StackOperation,
    spinner: Ora
  ): Promise<Stack> {
    const target = operation === 'create' ? StackStatus.CREATE_COMPLETE : StackStatus.UPDATE_COMPLETE;

    let outcome: StackSnapshot;
    try {
      outcome = await this.pollStack(stackName, (status) => {
        spinner.text = `Waiting for stack ${stackName} (${status})...`;
      });
    } catch (error) {
      spinner.fail(`Stack ${stackName} did not finish`);
      throw error;
    }

    const { stack, status } = outcome;
    if (stack && status === target) {
      spinner.succeed(`Stack ${stackName} ${operation === 'create' ? 'created' : 'updated'}`);
      return stack;
    }

    spinner.fail(`Stack ${stackName} ${operation} failed (${status})`);
    throw await this.operationError(stackName, operation, status, stack?.StackStatusReason);
  }

  /**
   * Wait for an operation started elsewhere to finish, whatever its outcome
   */
  private async waitForSettled(stackName: string): Promise<Stack | null> {
    const spinner = startSpinner(
      `Stack ${stackName} is busy, waiting for the running operation...`,
      this.context.showProgress
    );

    try {
      const { stack, status } = await this.pollStack(stackName, (current) => {
        spinner.text = `Stack ${stackName} is busy (${current}), waiting...`;
      });
      spinner.succeed(`Stack ${stackName} settled (${status})`);
      return stack;
    } catch (error) {
      spinner.fail(`Stack ${stackName} did not settle`);
      throw error;
    }
  }

  /**
   * Poll DescribeStacks until the status leaves *_IN_PROGRESS
   */
  private async pollStack(
    stackName: string,
    onPending: (status: string) => void
  ): Promise<StackSnapshot> {
    const { intervalMs, timeoutMs } = this.options.polling;

    try {
      return await pollUntil(
        async () => {
          const stack = await this.describeStack(stackName);
          const status = stack?.StackStatus ?? StackStatus.DELETE_COMPLETE;
          return isInProgress(status) ? pending<StackSnapshot>(status) : done<StackSnapshot>({ stack, status });
        },
        {
          intervalMs,
          timeoutMs,
          clock: this.context.clock,
          signal: this.context.signal,
          onPending: (status) => onPending(status ?? 'UNKNOWN'),
        }
      );
    } catch (error) {
      if (error instanceof PollTimeoutError) {
        throw new StackTimeoutError(stackName, error.elapsedMs, error.lastStatus);
      }
      throw error;
    }
  }

  private async operationError(
    stackName: string,
    operation: StackOperation,
    status: string,
    statusReason?: string
  ): Promise<StackCreateError | StackUpdateError> {
    const ErrorType = operation === 'create' ? StackCreateError : StackUpdateError;

    let events: StackEventSummary[];
    try {
      events = await this.getFailedEvents(stackName);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return new ErrorType(stackName, status, [], `${statusReason ?? status} (stack events unavailable: ${message})`);
    }

    // The first failed resource explains the rollback better than the stack reason
    return new ErrorType(stackName, status, events, events.length > 0 ? undefined : statusReason);
  }

  private toDeployment(
    stackName: string,
    parameters: Record<string, string>,
    status: DeploymentStatus,
    stack: Stack
  ): StackDeployment {
    return {
      stackName,
      parameters,
      status,
      outputs: extractOutputs(stack),
      stackId: stack.StackId,
    };
  }

  private stackTags(): Array<{ Key: string; Value: string }> {
    return Object.entries(this.options.tags ?? {}).map(([Key, Value]) => ({ Key, Value }));
  }
}

/**
 * Stack outputs as a name → value map
 */
export function extractOutputs(stack: Stack): Record<string, string> {
  const outputs: Record<string, string> = {};
  for (const output of stack.Outputs ?? []) {
    if (output.OutputKey && output.OutputValue !== undefined) {
      outputs[output.OutputKey] = output.OutputValue;
    }
  }
  return outputs;
}

function toParameters(parameters: Record<string, string>) {
  return Object.entries(parameters).map(([ParameterKey, ParameterValue]) => ({
    ParameterKey,
    ParameterValue,
  }));
}

function isStackEvent(event: StackEvent, stackName: string): boolean {
  return event.ResourceType === 'AWS::CloudFormation::Stack' && event.LogicalResourceId === stackName;
}

function isOperationStart(event: StackEvent, stackName: string): boolean {
  return isStackEvent(event, stackName) && OPERATION_START_STATUSES.has(event.ResourceStatus ?? '');
}
