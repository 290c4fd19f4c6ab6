export type { AutomationEngine, ElementRef } from './automation-engine';
export { PlaywrightEngine } from './playwright-engine';
