/**
 * Messaging Module - Public API
 */

export { MessageHandler, type ChannelResolver } from './MessageHandler.mjs';
export { parseTopology, UNASSIGNED_AREA, type TopologyBodies } from './TopologyParser.mjs';
