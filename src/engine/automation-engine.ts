/**
 * Contract of the browser automation collaborator.
 *
 * Implementations re-query live state on every call; a reference never
 * caches element state.
 */

export interface ElementRef {
  /** Engine selector the reference was resolved from */
  readonly selector: string;
}

export interface AutomationEngine {
  resolve(selector: string): Promise<ElementRef>;
  isPresent(ref: ElementRef): Promise<boolean>;
  isEnabled(ref: ElementRef): Promise<boolean>;
  isDisplayed(ref: ElementRef): Promise<boolean>;
  click(ref: ElementRef): Promise<void>;
  getText(ref: ElementRef): Promise<string>;
}
