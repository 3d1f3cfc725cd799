/**
 * Router Module - Public API
 */

export {
  EventRouter,
  type CommandSink,
  type DeviceLookup,
  type EventRouterOptions,
  type StatePublisher,
  type SynchronizeOptions,
} from './EventRouter.mjs';
export {
  actionTopic,
  availabilityTopic,
  commandSubscription,
  hubStatusTopic,
  parseCommand,
  stateTopic,
  topicSegment,
  type ParseResult,
} from './TopicCodec.mjs';
