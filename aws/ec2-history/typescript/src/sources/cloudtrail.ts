/**
 * CloudTrail event source.
 *
 * Looks up `RunInstances` and `TerminateInstances` management events and
 * flattens each event's `responseElements.instancesSet.items` into one raw
 * record per instance.
 *
 * @module sources/cloudtrail
 */

import { LookupAttributeKey, LookupEventsCommand } from '@aws-sdk/client-cloudtrail';
import type {
  CloudTrailClient,
  Event as CloudTrailEvent,
  LookupEventsCommandInput,
  LookupEventsCommandOutput,
} from '@aws-sdk/client-cloudtrail';
import { z } from 'zod';

import { mapAwsError } from '../error/mapper.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { abortReason } from '../resilience/abort.js';
import type { RawLaunchRecord, RawTerminationRecord } from '../types/raw.js';
import type { ReportWindow } from '../types/window.js';
import type { LaunchEventSource, TerminationEventSource } from './types.js';

/**
 * Fetches one page of LookupEvents in a region.
 */
export type LookupEventsPage = (
  region: string,
  input: LookupEventsCommandInput,
  signal?: AbortSignal
) => Promise<LookupEventsCommandOutput>;

/**
 * Builds a page function on top of per-region SDK clients.
 */
export function lookupEventsWith(clientFor: (region: string) => CloudTrailClient): LookupEventsPage {
  return (region, input, signal) =>
    clientFor(region).send(new LookupEventsCommand(input), { abortSignal: signal });
}

/**
 * Largest page LookupEvents returns.
 */
const PAGE_SIZE = 50;

const instanceItemSchema = z
  .object({
    instanceId: z.unknown(),
    instanceType: z.unknown(),
  })
  .passthrough();

const eventDetailSchema = z
  .object({
    eventTime: z.string().optional(),
    errorCode: z.string().optional(),
    responseElements: z
      .object({
        instancesSet: z
          .object({ items: z.array(instanceItemSchema).optional() })
          .passthrough()
          .nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

type InstanceItem = z.infer<typeof instanceItemSchema>;

/**
 * Instances named in one CloudTrail event.
 *
 * - `skipped`: the API call failed (`errorCode` set) or named no instance
 * - `unreadable`: the embedded event JSON could not be parsed
 */
export type ExtractedInstances =
  | { status: 'ok'; eventTime: unknown; items: InstanceItem[] }
  | { status: 'skipped'; reason: string }
  | { status: 'unreadable'; eventTime: unknown };

export function extractInstances(event: CloudTrailEvent): ExtractedInstances {
  let json: unknown;
  try {
    json = JSON.parse(event.CloudTrailEvent ?? '');
  } catch {
    return { status: 'unreadable', eventTime: event.EventTime };
  }

  const parsed = eventDetailSchema.safeParse(json);
  if (!parsed.success) {
    return { status: 'unreadable', eventTime: event.EventTime };
  }

  const detail = parsed.data;
  if (detail.errorCode) {
    return { status: 'skipped', reason: `call failed with ${detail.errorCode}` };
  }

  const items = detail.responseElements?.instancesSet?.items ?? [];
  if (items.length === 0) {
    return { status: 'skipped', reason: 'no instances in response' };
  }

  return { status: 'ok', eventTime: detail.eventTime ?? event.EventTime, items };
}

export class CloudTrailEventSource implements LaunchEventSource, TerminationEventSource {
  private readonly lookup: LookupEventsPage;
  private readonly logger: Logger;

  constructor(lookup: LookupEventsPage, logger: Logger = new NoopLogger()) {
    this.lookup = lookup;
    this.logger = logger;
  }

  async fetchLaunches(region: string, window: ReportWindow, signal?: AbortSignal): Promise<RawLaunchRecord[]> {
    const events = await this.lookupAll(region, 'RunInstances', window, signal);
    return this.flatten(region, events, (eventId, eventTime, item) => ({
      eventId,
      eventTime,
      instanceId: item?.instanceId,
      instanceType: item?.instanceType,
    }));
  }

  async fetchTerminations(
    region: string,
    window: ReportWindow,
    signal?: AbortSignal
  ): Promise<RawTerminationRecord[]> {
    const events = await this.lookupAll(region, 'TerminateInstances', window, signal);
    return this.flatten(region, events, (eventId, eventTime, item) => ({
      eventId,
      eventTime,
      instanceId: item?.instanceId,
    }));
  }

  /**
   * Pages through LookupEvents for one event name.
   */
  async lookupAll(
    region: string,
    eventName: string,
    window: ReportWindow,
    signal?: AbortSignal
  ): Promise<CloudTrailEvent[]> {
    const events: CloudTrailEvent[] = [];
    let nextToken: string | undefined;

    do {
      if (signal?.aborted) {
        throw abortReason(signal);
      }

      let page: LookupEventsCommandOutput;
      try {
        page = await this.lookup(
          region,
          {
            LookupAttributes: [{ AttributeKey: LookupAttributeKey.EVENT_NAME, AttributeValue: eventName }],
            StartTime: new Date(window.start),
            EndTime: new Date(window.end),
            MaxResults: PAGE_SIZE,
            NextToken: nextToken,
          },
          signal
        );
      } catch (error) {
        throw mapAwsError(error, region);
      }

      events.push(...(page.Events ?? []));
      nextToken = page.NextToken;
    } while (nextToken);

    this.logger.debug('CloudTrail lookup complete', { region, eventName, events: events.length });
    return events;
  }

  // An unreadable event still yields one record, without an instance id,
  // so the normalizer reports it.
  private flatten<R>(
    region: string,
    events: CloudTrailEvent[],
    toRecord: (eventId: string | undefined, eventTime: unknown, item?: InstanceItem) => R
  ): R[] {
    const records: R[] = [];

    for (const event of events) {
      const extracted = extractInstances(event);
      switch (extracted.status) {
        case 'ok':
          for (const item of extracted.items) {
            records.push(toRecord(event.EventId, extracted.eventTime, item));
          }
          break;
        case 'unreadable':
          records.push(toRecord(event.EventId, extracted.eventTime));
          break;
        case 'skipped':
          this.logger.debug('Skipping CloudTrail event', {
            region,
            eventId: event.EventId,
            reason: extracted.reason,
          });
          break;
      }
    }

    return records;
  }
}
