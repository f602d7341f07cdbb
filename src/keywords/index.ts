export { isCheckFrequency, isKeywordPriority, selectKeywordsForRun } from './priority-filter';
