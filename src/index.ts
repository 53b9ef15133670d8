/**
 * Tides MCP Server - Library Entry Point
 */

// Export MCP server
export { createTidesMcpServer } from './mcp'
export type { TidesMcpServerOptions } from './mcp'
export { registerTideTools, TIDE_TOOL_NAMES } from './mcp/tools/tideTools'

// Export config
export { getConfig, resetConfig, expandStoragePath, resolveStoragePath } from './config'
export type { TidesConfig, LogLevel } from './config'

// Export storage & service
export { TideStore } from './core/TideStore'
export { computeNextFlow, FLOW_INTERVAL_DAYS } from './core/flowSchedule'
export {
  TideService,
  toTideSummary,
  FLOW_GUIDANCE,
  FLOW_NEXT_ACTIONS,
  DEFAULT_FLOW_DURATION,
  DEFAULT_FLOW_INTENSITY
} from './services/tideService'
export type {
  CreateTideArgs,
  CreateTideResult,
  ListTidesArgs,
  ListTidesResult,
  FlowTideArgs,
  FlowTideResult,
  EndTideArgs,
  EndTideResult,
  EndTideStatus
} from './services/tideService'

// Export types & schemas
export {
  flowTypeSchema,
  tideStatusSchema,
  flowIntensitySchema,
  flowEntrySchema,
  tideRecordSchema,
  tidePatchSchema
} from './types'
export type {
  FlowType,
  TideStatus,
  FlowIntensity,
  FlowEntry,
  TideRecord,
  TidePatch,
  CreateTideInput,
  ListTidesFilter,
  TideSummary
} from './types'

// Export errors & logging
export {
  TidesError,
  ValidationError,
  StorageUnavailableError,
  getErrorMessage
} from './errors'
export { createLogger, setLogLevel, getLogLevel } from './logger'
export type { TidesLogger } from './logger'
export { genTideId, isTideId } from './id'
