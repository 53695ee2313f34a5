/**
 * windgauge - Centralized Export Module
 *
 * Library surface for embedding the dashboard pieces:
 * - HTTP fetch with rate-limit retries
 * - Power data accessors
 * - Table rendering and the tick loop
 * - Configuration and error types
 */

// Configuration
export {
	type CliOptions,
	clearConfigCache,
	getConfigSource,
	getDefaultConfig,
	loadConfig,
	resolveSettings,
	type Settings,
	type WindgaugeRc,
} from "./config.js";
// Tick loop
export { DashboardLoop, type LoopStatus, msUntilNextSecond, type TickKind } from "./dashboard-loop.js";
export { createDashboardState, type DashboardState, requireLayout, type TableLayout } from "./dashboard-state.js";
// Errors
export {
	AppError,
	ConfigError,
	DashboardStateError,
	EmptyResponseError,
	HistoricalDataNotFoundError,
	MalformedResponseError,
	TransportError,
} from "./errors.js";
// HTTP
export { type FetchTextOptions, fetchText } from "./http-fetcher.js";
export { isExitKey, listenForExitKeys } from "./key-listener.js";
// Data accessors
export { PowerDataClient, type PowerDataClientOptions, type Reading } from "./power-data.js";
export { type PowerDashboardOptions, runPowerDashboard } from "./power-dashboard.js";
// Rendering
export {
	buildFullTable,
	computeBarLength,
	formatCountdown,
	renderFullTable,
	renderTimeRows,
} from "./table-renderer.js";
