import { execa } from 'execa';
import { errorMessage } from '../errors/custom-errors';

/**
 * Utility to validate video files
 */

export type DurationProbe = (filePath: string) => Promise<number>;

/**
 * Get video duration in seconds using ffprobe
 *
 * @throws Error when ffprobe fails or reports no duration
 */
export async function getVideoDuration(filePath: string): Promise<number> {
  let stdout: string;
  try {
    // ffprobe -v error -show_entries format=duration -of default=noprint_wrappers=1:nokey=1 input.mp4
    ({ stdout } = await execa('ffprobe', [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      filePath,
    ]));
  } catch (error) {
    throw new Error(`ffprobe failed for ${filePath}: ${errorMessage(error)}`);
  }

  const duration = Number.parseFloat(stdout.trim());
  if (Number.isNaN(duration)) {
    throw new Error(`ffprobe reported no duration for ${filePath}`);
  }
  return duration;
}

/**
 * Check if ffprobe is installed
 */
export async function checkFfprobeInstalled(): Promise<boolean> {
  try {
    await execa('ffprobe', ['-version']);
    return true;
  } catch {
    return false;
  }
}
