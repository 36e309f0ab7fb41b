/**
 * IAnimatorPort — time-based value animation.
 */

export interface AnimationSpec {
  readonly from: number;
  readonly to: number;
  readonly durationMs: number;
  /** Called once per frame with the eased value */
  readonly onUpdate: (value: number) => void;
}

export interface IAnimatorPort {
  /** Resolves after the final frame (value === to) has been delivered */
  animate(spec: AnimationSpec): Promise<void>;
}
