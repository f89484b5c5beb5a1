/**
 * RecordingHost — captures every side effect of a break sequence for test
 * assertions.
 */

import type { AudioSink, PlayerState, PlayerStateNotifier } from "./collaborators.js";
import type { Unsubscribe } from "./notifier.js";

/** The notification points a RecordingHost can listen to. */
export interface SequenceEvents {
  onStarted(listener: () => void): Unsubscribe;
  onCompleted(listener: () => void): Unsubscribe;
}

/** Union of all recorded side effects, tagged for easy filtering. */
export type RecordedEvent =
  | { readonly kind: "started" }
  | { readonly kind: "sound"; readonly clipId: string }
  | { readonly kind: "completed" }
  | { readonly kind: "playerState"; readonly state: PlayerState };

/**
 * An AudioSink and PlayerStateNotifier that records every call, plus the
 * started/completed notifications of any sequence it is attached to.
 *
 * @example
 * ```ts
 * const host = new RecordingHost();
 * const sequence = new BreakSequence({ config, orientation, audio: host, player: host });
 * host.attach(sequence);
 *
 * sequence.activate();
 * expect(host.all).toEqual([{ kind: "started" }]);
 * ```
 */
export class RecordingHost implements AudioSink, PlayerStateNotifier {
  /** All events in emission order. */
  readonly all: RecordedEvent[] = [];
  /** Clip ids passed to `playOnce`. */
  readonly sounds: string[] = [];
  /** States passed to `setPlayerState`. */
  readonly playerStates: PlayerState[] = [];

  private readonly subscriptions: Unsubscribe[] = [];

  playOnce(clipId: string): void {
    this.sounds.push(clipId);
    this.all.push({ kind: "sound", clipId });
  }

  setPlayerState(state: PlayerState): void {
    this.playerStates.push(state);
    this.all.push({ kind: "playerState", state });
  }

  /** Record the started/completed notifications of `events`. */
  attach(events: SequenceEvents): void {
    this.subscriptions.push(
      events.onStarted(() => {
        this.all.push({ kind: "started" });
      }),
      events.onCompleted(() => {
        this.all.push({ kind: "completed" });
      }),
    );
  }

  /** Stop listening to every attached sequence. */
  detach(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions.length = 0;
  }

  /** Number of recorded events of a kind. */
  count(kind: RecordedEvent["kind"]): number {
    return this.all.filter((event) => event.kind === kind).length;
  }

  /** Clear all recorded events. */
  clear(): void {
    this.all.length = 0;
    this.sounds.length = 0;
    this.playerStates.length = 0;
  }
}
