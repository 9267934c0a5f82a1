// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @switchyard/core — Typed in-process message dispatcher
 *
 * Public API surface:
 * - createPathway() → bounded FIFO with back-pressure (sender/receiver pair)
 * - Dispatcher → registry of type-erased endpoints (register/seal/send/take)
 * - buildDispatcher() → declarative topology of pathways and links
 * - endpointHandle() → typed send/recv view of one link endpoint
 * - MessageDescriptor → runtime type tag shared by every validator
 */

// Message model
export {
  assertMessageDescriptor,
  checkEnvelope,
  defineMessage,
  envelope,
  isEnvelope,
  isEnvelopeOf,
  isMessageDescriptor,
} from "./protocol/message-descriptor.js";
export type {
  AnyMessageDescriptor,
  Envelope,
  EnvelopeCheck,
  EnvelopeOf,
  InferPayload,
  MessageDescriptor,
  PayloadCheck,
  PayloadValidator,
} from "./protocol/message-descriptor.js";

// Pathways
export { assertCapacity, createPathway } from "./pathway/pathway.js";
export { PathwayReceiver } from "./pathway/receiver.js";
export type {
  Receiver,
  RecvOptions,
  TryRecvResult,
} from "./pathway/receiver.js";
export { PathwaySender } from "./pathway/sender.js";
export type { SendOptions } from "./pathway/sender.js";

// Type-erased endpoints
export { ClaimSlot } from "./endpoint/claim-slot.js";
export { receiverEndpoint } from "./endpoint/receiver-endpoint.js";
export type { ReceiverEndpoint } from "./endpoint/receiver-endpoint.js";
export { senderEndpoint } from "./endpoint/sender-endpoint.js";
export type { SenderEndpoint } from "./endpoint/sender-endpoint.js";

// Dispatcher
export { Dispatcher } from "./core/dispatcher.js";
export type {
  DispatcherSnapshot,
  LinkSendOptions,
  PathwayRegistration,
  VerifyExpectations,
} from "./core/dispatcher.js";
export { dispatchKey, parseDispatchKey } from "./core/dispatch-key.js";
export type { DispatchKeyParts } from "./core/dispatch-key.js";
export { endpointId, identityName } from "./core/identity.js";
export type { EndpointId, IdentityRef } from "./core/identity.js";
export type { Addressing, PathwayRoute } from "./core/route-table.js";

// Topology
export { addLink, addPathway, buildDispatcher } from "./core/builder.js";
export type {
  BuildOptions,
  LinkEndpointSpec,
  LinkSpec,
  PathwaySpec,
  TopologySpec,
} from "./core/builder.js";
export { EndpointHandle, endpointHandle } from "./core/handle.js";
export type { EndpointHandleSpec } from "./core/handle.js";

// Configuration
export { DEFAULTS } from "./constants.js";
export type { DispatcherOptions } from "./options/dispatcher.js";

// Error handling
export { SwitchyardError, isSwitchyardError } from "./error/error.js";
export { translateError } from "./error/translate.js";
export { getErrorMetadata, isErrorCode } from "./error/codes.js";
export type {
  ErrorCode,
  ErrorMetadata,
  ErrorPhase,
  SwitchyardErrorData,
} from "./error/codes.js";
export { invariant, unreachable } from "./utils/assert.js";

// Logging
export { createLogger, DefaultLoggerAdapter, LOG_CONTEXT } from "./logger.js";
export type { LoggerAdapter, LoggerOptions, LogLevel } from "./logger.js";
