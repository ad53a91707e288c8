/**
 * Sources
 *
 * Collaborator contracts and their AWS SDK implementations.
 */

export type {
  RegionList,
  LaunchEventSource,
  TerminationEventSource,
  RunningSnapshotSource,
  HistorySources,
} from './types.js';
export type { LookupEventsPage, ExtractedInstances } from './cloudtrail.js';
export { CloudTrailEventSource, extractInstances, lookupEventsWith } from './cloudtrail.js';
export type { DescribeInstancesPage, DescribeRegionsCall } from './ec2.js';
export {
  Ec2RunningSnapshotSource,
  Ec2RegionList,
  describeInstancesWith,
  describeRegionsWith,
} from './ec2.js';
