// This module is a library entry point
// For CLI usage, run: npx shelfsync download <directory>

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./catalog.js"
export * from "./credentials.js"
export * from "./filters.js"
export * from "./hash.js"
export * from "./paths.js"
export * from "./retry.js"
export * from "./progress.js"
export {
	HTTP_AGENT,
	HttpTransport,
	parseContentRange,
	type HttpTransportOptions,
	type ProgressCallback,
	type TransferResponse,
	type Transport,
} from "./transfer.js"
export * from "./core/index.js"
