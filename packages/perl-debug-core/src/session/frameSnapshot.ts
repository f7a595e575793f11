import {
  BridgeFrame,
  BridgeLocation,
  BridgeVariable,
  VariableScope,
} from '../bridge/debuggeeBridge';

export type VariableContainer =
  | { kind: 'scope'; scope: VariableScope; frameIndex: number }
  | { kind: 'children'; children: BridgeVariable[] };

/**
 * What the client may ask about during one stop. Handles come from a
 * session-wide counter, so ids handed out during an earlier stop never
 * resolve against a later snapshot.
 */
export class FrameSnapshot {
  private readonly frameIdsByIndex = new Map<number, number>();
  private readonly frameIndexById = new Map<number, number>();
  private readonly containers = new Map<number, VariableContainer>();
  private frames: BridgeFrame[] | undefined;

  constructor(
    private readonly allocateHandle: () => number,
    public readonly top: BridgeLocation | undefined,
  ) {}

  get cachedFrames(): BridgeFrame[] | undefined {
    return this.frames;
  }

  /** Frames known without asking the debugger: just the stop location. */
  fallbackFrames(): BridgeFrame[] {
    if (!this.top) {
      return [];
    }
    return [
      { name: this.top.subroutine, file: this.top.file, line: this.top.line },
    ];
  }

  rememberFrames(frames: BridgeFrame[]): void {
    this.frames = frames;
  }

  frameId(frameIndex: number): number {
    let id = this.frameIdsByIndex.get(frameIndex);
    if (id === undefined) {
      id = this.allocateHandle();
      this.frameIdsByIndex.set(frameIndex, id);
      this.frameIndexById.set(id, frameIndex);
    }
    return id;
  }

  frameIndex(frameId: number): number | undefined {
    return this.frameIndexById.get(frameId);
  }

  reference(container: VariableContainer): number {
    const ref = this.allocateHandle();
    this.containers.set(ref, container);
    return ref;
  }

  container(ref: number): VariableContainer | undefined {
    return this.containers.get(ref);
  }
}
