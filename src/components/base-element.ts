/**
 * BaseElement — shared base for the Lit components overlaid on the browser content.
 */
import { LitElement, css } from 'lit';

/** Shared host styles */
export const sharedStyles = css`
  :host {
    position: absolute;
    inset: 0;
    box-sizing: border-box;
    pointer-events: none;
    will-change: transform, opacity;
  }

  :host([hidden]) { display: none; }
`;

export class BaseElement extends LitElement {
  /** Pixel translation along x, applied as an inline transform */
  protected applyTranslationX(value: number): void {
    this.style.transform = value === 0 ? '' : `translateX(${value}px)`;
  }
}
