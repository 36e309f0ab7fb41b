/**
 * ToolbarGestureHandler — ISwipeGestureListener that turns a drag on the
 * toolbar into a tab switch, the tab tray, or a new tab.
 *
 * The gesture math lives in `../gesture` as pure functions over a
 * GestureSession value; this class is the thin layer that:
 *  1. Arms a session when a drag starts inside the toolbar
 *  2. Re-resolves the destination and writes clamped offsets to the surfaces on every move
 *  3. On release, plans the settle and plays it through IAnimatorPort
 *  4. Performs the single terminal side effect once the animation has finished
 */

import type { IAnimatorPort } from '../ports/animator.port';
import type { IToolbarEnvironmentPort } from '../ports/environment.port';
import type { INavigationPort } from '../ports/navigation.port';
import type { IContentSurfacePort, ITabPreviewPort } from '../ports/surface.port';
import type {
  ISwipeGestureListener,
  RejectReason,
  SettleOutcome,
  ToolbarGestureEvents,
} from '../ports/swipe-gesture.port';
import type { ITabStorePort } from '../ports/tab-store.port';
import type { Destination, Point } from '../ports/types';
import { createGestureConfig, type GestureConfig } from '../config/gesture-config';
import { isFling, isGestureComplete } from '../gesture/completion';
import { resolveDestination } from '../gesture/destination';
import { classifyDirection, dominantAxis, isHorizontal, rectContains, toolbarHitRect } from '../gesture/direction';
import {
  applySwipeUpdate,
  previewOffsetFor,
  stagePreview,
  startSession,
  switchedContentOffset,
  type GestureSession,
  type SessionEnvironment,
} from '../gesture/session';
import { planSettle, type SettlePlan } from '../gesture/settle-plan';
import { GestureStateError } from '../utils/errors';
import { logger } from '../utils/logger';
import { TypedEventBus } from './event-bus';

export type HandlerState = 'idle' | 'armed' | 'updating' | 'completing' | 'canceling';

export interface ToolbarGestureDeps {
  readonly content: IContentSurfacePort;
  readonly preview: ITabPreviewPort;
  readonly tabs: ITabStorePort;
  readonly navigation: INavigationPort;
  readonly environment: IToolbarEnvironmentPort;
  readonly animator: IAnimatorPort;
  /** Shared bus; a private one is created when omitted */
  readonly events?: TypedEventBus<ToolbarGestureEvents>;
  readonly config?: Partial<GestureConfig>;
}

const LOG_CAT = 'ToolbarGesture';

export class ToolbarGestureHandler implements ISwipeGestureListener {
  readonly events: TypedEventBus<ToolbarGestureEvents>;
  private readonly config: GestureConfig;
  private state: HandlerState = 'idle';
  private session: GestureSession | null = null;
  /** Tab whose thumbnail the preview currently shows */
  private stagedTabId: string | null = null;

  constructor(private readonly deps: ToolbarGestureDeps) {
    this.events = deps.events ?? new TypedEventBus<ToolbarGestureEvents>();
    this.config = createGestureConfig(deps.config);
  }

  getState(): HandlerState {
    return this.state;
  }

  /** Live session while a gesture is armed or settling */
  getSession(): GestureSession | null {
    return this.session;
  }

  // ── ISwipeGestureListener ──

  onSwipeStarted(start: Point, next: Point): boolean {
    const { environment, content } = this.deps;
    if (this.state !== 'idle') return this.reject('busy');

    const dx = next.x - start.x;
    const dy = next.y - start.y;
    const direction = classifyDirection(dx, dy);

    if (environment.isKeyboardVisible()) return this.reject('keyboard-visible');

    const hitRect = toolbarHitRect(environment.getToolbarRect(), environment.toolbarPosition, environment.getInsets());
    if (!rectContains(hitRect, start)) return this.reject('outside-toolbar');

    const axis = dominantAxis(dx, dy, this.config.touchSlopPx);
    if (!axis) return this.reject('below-slop');

    let session = startSession(direction, start, this.snapshotEnvironment(), content.translationX, 0);
    const destination = this.resolve(session);

    this.stagedTabId = null;
    if (axis === 'horizontal' && destination.kind === 'tab') {
      session = this.stage(stagePreview(session), destination);
    }

    this.session = session;
    this.state = 'armed';
    logger.debug(LOG_CAT, 'Armed', { direction, destination: destination.kind });
    this.events.emit('gesture:armed', { direction, destination });
    return true;
  }

  onSwipeUpdate(distanceX: number, _distanceY: number): void {
    let session = this.requireSession('onSwipeUpdate');
    const { content, preview } = this.deps;
    const destination = this.resolve(session);

    // A neighbour can appear mid-drag; bring its preview in beside the content
    if (destination.kind === 'tab' && destination.tabId !== this.stagedTabId) {
      const unstaged = this.stagedTabId === null;
      session = this.stage(unstaged ? stagePreview(session, session.contentOffset) : session, destination);
    }

    const next = applySwipeUpdate(session, destination, distanceX, content.width, this.config.overscrollHidePercent);
    switch (destination.kind) {
      case 'tab':
        preview.translationX = next.previewOffset;
        content.translationX = next.contentOffset;
        break;
      case 'none':
        content.translationX = next.contentOffset;
        break;
      case 'tray':
        break;
    }

    this.session = next;
    this.state = 'updating';
  }

  async onSwipeFinished(velocityX: number, velocityY: number): Promise<SettleOutcome> {
    const session = this.requireSession('onSwipeFinished');
    const { direction, env } = session;
    const destination = this.resolve(session);

    const velocity = isHorizontal(direction) ? velocityX : velocityY;
    const complete = isGestureComplete(direction, velocity, session.previewOffset, env.windowWidth, this.config);
    const plan = planSettle({
      session,
      destination,
      complete,
      fling: isFling(velocity, this.config.minimumFlingVelocity),
    });
    logger.debug(LOG_CAT, 'Released', { direction, destination: destination.kind, complete, plan: plan.kind });

    const outcome = await this.settle(plan, session).finally(() => {
      this.session = null;
      this.stagedTabId = null;
      this.state = 'idle';
    });

    logger.info(LOG_CAT, 'Settled', { direction, outcome: outcome.kind });
    this.events.emit('gesture:settled', { direction, outcome });
    return outcome;
  }

  // ── Settle ──

  private async settle(plan: SettlePlan, session: GestureSession): Promise<SettleOutcome> {
    const { content, preview, tabs, navigation } = this.deps;

    switch (plan.kind) {
      case 'switch-tab': {
        this.state = 'completing';
        await this.animateSurfaces(session, switchedContentOffset(session.direction, session.env), this.config.finishedDurationMs);
        content.translationX = 0;
        tabs.selectTab(plan.tabId);

        // Real tab is showing underneath; fade the stand-in out
        await preview.fadeOut(this.config.shortAnimationMs);
        preview.visible = false;
        this.events.emit('telemetry:toolbar-tab-swipe', undefined);
        return { kind: 'switched-tab', tabId: plan.tabId };
      }
      case 'open-tray':
        this.state = 'completing';
        navigation.navigateToTray(plan.page);
        return { kind: 'opened-tray' };
      case 'open-new-tab':
        this.state = 'completing';
        navigation.navigateToNewTab(true);
        content.translationX = 0;
        preview.visible = false;
        return { kind: 'opened-new-tab' };
      case 'cancel': {
        this.state = 'canceling';
        const duration = plan.fling ? this.config.canceledFlingDurationMs : this.config.canceledDurationMs;
        await this.animateSurfaces(session, 0, duration);
        preview.visible = false;
        return { kind: 'canceled' };
      }
    }
  }

  /** Animate the content to `target`, dragging the preview along beside it */
  private animateSurfaces(session: GestureSession, target: number, durationMs: number): Promise<void> {
    const { content, preview, animator } = this.deps;
    return animator.animate({
      from: session.contentOffset,
      to: target,
      durationMs,
      onUpdate: (value) => {
        content.translationX = value;
        preview.translationX = previewOffsetFor(session.direction, value, session.env);
      },
    });
  }

  // ── Private ──

  /** Show the preview for `destination` at the session's preview offset */
  private stage(session: GestureSession, destination: Extract<Destination, { kind: 'tab' }>): GestureSession {
    const { preview } = this.deps;
    preview.loadThumbnail(destination.tabId, destination.isPrivate);
    preview.alpha = 1;
    preview.translationX = session.previewOffset;
    preview.visible = true;
    this.stagedTabId = destination.tabId;
    return session;
  }

  private resolve(session: GestureSession): Destination {
    return resolveDestination(session.direction, this.deps.tabs, session.env.layoutDirection);
  }

  private snapshotEnvironment(): SessionEnvironment {
    const { environment } = this.deps;
    return {
      windowWidth: environment.windowWidth,
      previewOffsetPx: this.config.previewOffsetPx,
      layoutDirection: environment.layoutDirection,
      toolbarPosition: environment.toolbarPosition,
      browsingMode: environment.browsingMode,
    };
  }

  private requireSession(caller: string): GestureSession {
    if (!this.session || (this.state !== 'armed' && this.state !== 'updating')) {
      throw new GestureStateError(`${caller} called without an armed gesture`, this.state);
    }
    return this.session;
  }

  private reject(reason: RejectReason): false {
    logger.debug(LOG_CAT, 'Rejected', { reason });
    this.events.emit('gesture:rejected', { reason });
    return false;
  }
}
