export {
	CorpusIndexerService,
	type BuildIndexOptions,
	type CorpusIndexerOptions,
	type ShutdownMonitor,
} from "./indexer/indexer.service.js";
export { inspectRows, type InspectOptions } from "./indexer/inspect.js";
export { NormalizerService, extractBody } from "./normalizer/normalizer.service.js";
export {
	type DecodeResult,
	type MessagePart,
	type ParsedMessage,
	DecodeError,
	parseMessage,
} from "./normalizer/mime-message.js";
export {
	type CsvSourceOptions,
	openCsvSource,
	readCsvSource,
} from "./source/csv-source.js";
export type { SourceItem, SourceRow } from "./source/source.types.js";
