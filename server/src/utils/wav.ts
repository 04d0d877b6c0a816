/**
 * WAV header helpers
 *
 * @module utils/wav
 */

/**
 * Playback length of a RIFF/WAVE buffer in milliseconds, from the `fmt `
 * byte rate and the `data` chunk size.
 *
 * A `data` size past the end of the buffer (streaming writers leave a
 * placeholder there) is clamped to the bytes actually present.
 *
 * @returns duration in ms, or null when the header cannot be read
 */
export function readWaveDurationMs(wavData: Buffer): number | null {
  if (wavData.length < 12) {
    return null;
  }
  if (
    wavData.toString("ascii", 0, 4) !== "RIFF" ||
    wavData.toString("ascii", 8, 12) !== "WAVE"
  ) {
    return null;
  }

  let byteRate: number | null = null;
  let offset = 12;
  while (offset + 8 <= wavData.length) {
    const chunkId = wavData.toString("ascii", offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === "fmt ") {
      if (chunkSize < 16 || body + 12 > wavData.length) {
        return null;
      }
      byteRate = wavData.readUInt32LE(body + 8);
    } else if (chunkId === "data") {
      if (!byteRate) {
        return null;
      }
      const dataSize = Math.min(chunkSize, wavData.length - body);
      return Math.round((dataSize / byteRate) * 1000);
    }

    offset = body + chunkSize;
    if (chunkSize % 2 !== 0) {
      offset++;
    }
  }
  return null;
}
