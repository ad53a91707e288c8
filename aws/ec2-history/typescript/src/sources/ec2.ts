/**
 * EC2 snapshot and region sources.
 * @module sources/ec2
 */

import { DescribeInstancesCommand, DescribeRegionsCommand } from '@aws-sdk/client-ec2';
import type {
  EC2Client,
  DescribeInstancesCommandInput,
  DescribeInstancesCommandOutput,
  DescribeRegionsCommandOutput,
} from '@aws-sdk/client-ec2';

import { DEFAULT_SNAPSHOT_STATES } from '../config/defaults.js';
import { mapAwsError } from '../error/mapper.js';
import { abortReason } from '../resilience/abort.js';
import type { RawRunningRecord } from '../types/raw.js';
import type { RegionList, RunningSnapshotSource } from './types.js';

/**
 * Fetches one page of DescribeInstances in a region.
 */
export type DescribeInstancesPage = (
  region: string,
  input: DescribeInstancesCommandInput,
  signal?: AbortSignal
) => Promise<DescribeInstancesCommandOutput>;

export type DescribeRegionsCall = (signal?: AbortSignal) => Promise<DescribeRegionsCommandOutput>;

export function describeInstancesWith(clientFor: (region: string) => EC2Client): DescribeInstancesPage {
  return (region, input, signal) =>
    clientFor(region).send(new DescribeInstancesCommand(input), { abortSignal: signal });
}

export function describeRegionsWith(client: EC2Client): DescribeRegionsCall {
  return (signal) => client.send(new DescribeRegionsCommand({}), { abortSignal: signal });
}

const PAGE_SIZE = 1000;

export class Ec2RunningSnapshotSource implements RunningSnapshotSource {
  private readonly describe: DescribeInstancesPage;
  private readonly states: readonly string[];

  constructor(describe: DescribeInstancesPage, states: readonly string[] = DEFAULT_SNAPSHOT_STATES) {
    this.describe = describe;
    this.states = states;
  }

  async fetchRunning(region: string, signal?: AbortSignal): Promise<RawRunningRecord[]> {
    const records: RawRunningRecord[] = [];
    let nextToken: string | undefined;

    do {
      if (signal?.aborted) {
        throw abortReason(signal);
      }

      let page: DescribeInstancesCommandOutput;
      try {
        page = await this.describe(
          region,
          {
            Filters: [{ Name: 'instance-state-name', Values: [...this.states] }],
            MaxResults: PAGE_SIZE,
            NextToken: nextToken,
          },
          signal
        );
      } catch (error) {
        throw mapAwsError(error, region);
      }

      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          records.push({
            instanceId: instance.InstanceId,
            instanceType: instance.InstanceType,
            launchTime: instance.LaunchTime,
          });
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);

    return records;
  }
}

/**
 * Regions enabled for the account, sorted.
 */
export class Ec2RegionList implements RegionList {
  private readonly describe: DescribeRegionsCall;

  constructor(describe: DescribeRegionsCall) {
    this.describe = describe;
  }

  async listRegions(signal?: AbortSignal): Promise<string[]> {
    let output: DescribeRegionsCommandOutput;
    try {
      output = await this.describe(signal);
    } catch (error) {
      throw mapAwsError(error);
    }

    return (output.Regions ?? [])
      .map((region) => region.RegionName)
      .filter((name): name is string => typeof name === 'string' && name.length > 0)
      .sort();
  }
}
