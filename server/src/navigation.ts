export type NavigationAction = "next" | "prev";

export type NavigationState = {
  readonly currentIndex: number;
  readonly slideCount: number;
};

export type NavigationResult = {
  applied: boolean;
  state: NavigationState;
};

export function nextSlideIndex(current: number, count: number): number {
  return (current + 1) % count;
}

export function prevSlideIndex(current: number, count: number): number {
  return (current - 1 + count) % count;
}

/**
 * The same transitions, as script text for documents that navigate without a server.
 * Kept beside the TypeScript versions so the two cannot drift apart unnoticed.
 */
export const CLIENT_NAVIGATION_FUNCTIONS = [
  "function nextSlideIndex(current, count) {",
  "  return (current + 1) % count;",
  "}",
  "function prevSlideIndex(current, count) {",
  "  return (current - 1 + count) % count;",
  "}"
].join("\n");

export function initialNavigationState(slideCount: number): NavigationState {
  if (!Number.isInteger(slideCount) || slideCount < 1) {
    throw new RangeError(`slideCount must be a positive integer, got ${slideCount}`);
  }
  return { currentIndex: 0, slideCount };
}

export function transitionNavigation(state: NavigationState, action: NavigationAction): NavigationState {
  const currentIndex =
    action === "next"
      ? nextSlideIndex(state.currentIndex, state.slideCount)
      : prevSlideIndex(state.currentIndex, state.slideCount);
  return { currentIndex, slideCount: state.slideCount };
}

export class NavigationController {
  private current: NavigationState;

  constructor(slideCount: number) {
    this.current = initialNavigationState(slideCount);
  }

  get state(): NavigationState {
    return this.current;
  }

  get currentIndex(): number {
    return this.current.currentIndex;
  }

  next(): NavigationState {
    return this.apply("next").state;
  }

  prev(): NavigationState {
    return this.apply("prev").state;
  }

  /**
   * Compare-and-set: when `expectedIndex` is given and no longer matches, nothing changes.
   */
  apply(action: NavigationAction, expectedIndex?: number): NavigationResult {
    if (expectedIndex !== undefined && expectedIndex !== this.current.currentIndex) {
      return { applied: false, state: this.current };
    }
    this.current = transitionNavigation(this.current, action);
    return { applied: true, state: this.current };
  }
}
