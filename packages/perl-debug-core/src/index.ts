/**
 * @file Main entry point for the Perl debug core library
 *
 * Exports the source index (line classification, breakpoint validation and
 * the classification cache), the DAP session state machine and its transport,
 * and the bridge to `perl -d`.
 *
 * @module perl-debug-core
 */

// Re-export DebugProtocol namespace
export type { DebugProtocol } from '@vscode/debugprotocol';

// Source indexing
export { createSourceBuffer, fingerprintOf } from './source/sourceBuffer';
export {
  LineClassification,
  EXECUTABLE,
  COMMENT,
  BLANK,
  DOCUMENTATION,
  DATA,
  phaseTag,
} from './source/lineClassification';
export { classifyLines, splitLines, scanHeredocs } from './source/lineClassifier';
export { MultilineConstructTracker } from './source/multilineTracker';
export { validateBreakpointLine } from './source/breakpointValidator';
export { collectInlineValues } from './source/inlineValues';
export { InMemorySourceIndexCache } from './source/sourceIndexCache';
export { SourceLoader, SourceReadError, toFileId } from './source/sourceLoader';

// Session
export {
  DebugSession,
  ADAPTER_CAPABILITIES,
  THREAD_ID,
} from './session/debugSession';
export { EventDispatcher } from './session/eventDispatcher';
export { BreakpointRegistry, parseHitCondition } from './session/breakpointRegistry';
export { canTransition, isLegalIn } from './session/sessionState';

// Transport
export { DAPProtocolServer } from './protocol/dapProtocolServer';

// Bridge
export {
  PerlDebuggerBridge,
  PerlBridgeFactory,
  acceptDebuggerConnection,
} from './bridge/perlDebuggerBridge';

// Configuration
export { ConfigManager } from './config/configManager';
export { SettingsLoader } from './config/settingsLoader';
export {
  DEFAULT_SETTINGS,
  LOG_LEVELS,
  SettingsError,
  isLogLevel,
} from './config/adapterSettings';
export { parseLaunchArguments, parseAttachArguments } from './config/launchArguments';

// Errors and logging
export {
  ProtocolError,
  BridgeError,
  BridgeErrorBuilder,
  ErrorIds,
  errorMessage,
} from './errors';
export { silentLogger, componentLogger } from './logging';

// Types
export type { LoggerInterface } from './logging';
export type { SourceBuffer } from './source/sourceBuffer';
export type { LineTag, LineKind } from './source/lineClassification';
export type { LineValidation } from './source/breakpointValidator';
export type { InlineVariableLookup } from './source/inlineValues';
export type {
  SourceIndexCache,
  InMemorySourceIndexCacheOptions,
} from './source/sourceIndexCache';
export type { ReadFileFunction } from './source/sourceLoader';
export type {
  DebugSessionOptions,
  DebugSessionEvents,
  BridgeFactory,
} from './session/debugSession';
export type { SessionState } from './session/sessionState';
export type { Breakpoint, FunctionBreakpoint } from './session/breakpointRegistry';
export type {
  DAPProtocolServerEvents,
  InvalidRequest,
  MessageSink,
} from './protocol/dapProtocolServer';
export type {
  DebuggeeBridge,
  DebuggeeBridgeEvents,
  BridgeLocation,
  BridgeStop,
  BridgeFrame,
  BridgeVariable,
  ResumeMode,
  VariableScope,
} from './bridge/debuggeeBridge';
export type {
  DebuggeeProcess,
  SpawnFunction,
  StatFunction,
  AcceptFunction,
  PerlDebuggerBridgeHooks,
} from './bridge/perlDebuggerBridge';
export type { AdapterSettings, LogLevel } from './config/adapterSettings';
export type { LaunchArguments, AttachArguments } from './config/launchArguments';
export type { ErrorId, BridgeErrorStage } from './errors';
