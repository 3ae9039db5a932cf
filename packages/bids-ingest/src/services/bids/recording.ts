/**
 * Recording consistency rebuild
 *
 * Default RebuildRecording used after each structural change when the caller
 * does not supply its own.
 */

import { FIDUCIAL_CHANNEL_TYPE } from "@/lib/constants";
import type { Recording } from "@/types/recording";

export function rebuildRecording(recording: Recording): Recording {
  recording.channels = recording.channels.map((channel) =>
    channel.isDataChannel ? channel : { ...channel, isDataChannel: true },
  );

  recording.nonDataChannels = recording.nonDataChannels.map((channel) =>
    channel.isDataChannel
      ? { ...channel, isDataChannel: false, type: FIDUCIAL_CHANNEL_TYPE }
      : channel,
  );

  // Array.prototype.sort is stable, so same-latency events keep their order
  recording.events = [...recording.events].sort(
    (a, b) => a.latency - b.latency,
  );

  return recording;
}

/**
 * Number of ICA components, i.e. the smaller weights dimension
 */
export function componentCount(recording: Recording): number | undefined {
  const weights = recording.ica?.weights;
  if (!weights) return undefined;
  const rows = weights.length;
  const columns = rows > 0 ? weights[0].length : 0;
  return Math.min(rows, columns);
}
