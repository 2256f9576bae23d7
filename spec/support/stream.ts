import type { OpenedStream, StreamOpener } from '../../src/stream/client.ts';
import type { StreamFrame } from '../../src/stream/types.ts';

/** Frames served by one opened stream; an `Error` entry fails the stream at that point. */
export type ScriptedStream = {
  items: Array<StreamFrame | Error>;
  /** Keep the stream open (pending forever) after the last item instead of ending it. */
  hang?: boolean;
};

export type ScriptedOpener = {
  open: StreamOpener;
  /** `[startingVersion, endingVersion]` of every open call. */
  calls: Array<[number, number | undefined]>;
  cancelled: number;
};

async function* serve(script: ScriptedStream): AsyncGenerator<StreamFrame> {
  for (const item of script.items) {
    if (item instanceof Error) throw item;
    yield item;
  }
  if (script.hang) await new Promise<never>(() => undefined);
}

/**
 * Opener that answers successive open calls from `scripts`; an `Error` entry rejects that open.
 */
export function scriptedOpener(scripts: Array<ScriptedStream | Error>): ScriptedOpener {
  const state: ScriptedOpener = {
    calls: [],
    cancelled: 0,
    open: async (startingVersion, endingVersion) => {
      const n = state.calls.length;
      state.calls.push([startingVersion, endingVersion]);
      const script = scripts[n];
      if (script === undefined) throw new Error(`no scripted stream for open #${n + 1}`);
      if (script instanceof Error) throw script;
      const opened: OpenedStream = {
        frames: serve(script),
        connectionId: `conn-${n + 1}`,
        cancel: () => {
          state.cancelled++;
        },
      };
      return opened;
    },
  };
  return state;
}
