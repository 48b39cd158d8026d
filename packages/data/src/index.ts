export { InMemoryBarSource } from "./inMemoryBarSource";
export type { BarSeriesInput } from "./inMemoryBarSource";
export {
	loadBarFile,
	loadBarSource,
	parseBarCsv,
	parseBarJson,
	parseTimestamp,
	symbolFromPath,
} from "./barFiles";
export type { ParseBarsOptions } from "./barFiles";
