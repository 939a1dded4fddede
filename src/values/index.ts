export { SeededRandom } from './SeededRandom.js';
export type { ValueContext, ValueSource } from './ValueSource.js';
export { DefaultValueSource, DEFAULT_DEMOGRAPHICS_FILE, loadDemographics } from './DefaultValueSource.js';
export type { DemographicsData } from './DefaultValueSource.js';
