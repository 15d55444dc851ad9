export { Driver, DEFAULT_PROTOCOL, DEFAULT_RECEIVE_TIMEOUT, DEFAULT_SEND_TIMEOUT } from './driver.js';
export type { DriverOptions, SendResult } from './driver.js';
export { ChannelKind, isChannelKind } from './channel/kinds.js';
export type { AddressMap, PeersAddress } from './channel/kinds.js';
export { Inbox } from './channel/inbox.js';
export { Poller } from './channel/poller.js';
export { BroadcastFanOut } from './channel/fan-out.js';
export {
  DriverError,
  DriverReceiveError,
  DriverSendError,
  EndpointTimeoutError,
  FrameTooLargeError,
  PeersConnectionError,
  SocketTypeError,
} from './errors.js';
export { resolveHostAddress } from './host.js';
export { BROADCAST_DESTINATION } from './protocol/types.js';
export type { Message, MessageCodec, MessageInit } from './protocol/types.js';
export { createMessage, isMessage } from './protocol/message.js';
export { jsonCodec } from './protocol/codec.js';
export { canonicalize } from './protocol/serialize.js';
export { encodeFrame, FrameDecoder, MAX_FRAME_LENGTH } from './protocol/framing.js';
export type { InboundEndpoint, OutboundEndpoint, Transport } from './transport/interface.js';
export { createTransport, supportedProtocols } from './transport/index.js';
export type { TransportFactory } from './transport/index.js';
export { LocalTransport } from './transport/local.js';
export { TcpTransport, parseTcpAddress, formatTcpAddress } from './transport/tcp.js';
export type { TcpAddress } from './transport/tcp.js';
export { Libp2pTransport, STREAM_PROTOCOLS } from './transport/libp2p.js';
