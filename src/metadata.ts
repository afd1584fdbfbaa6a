import { writeFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseFile } from 'music-metadata';
import type { TrackMetadata } from './types.js';

export function coverPathFor(filePath: string): string {
  const ext = extname(basename(filePath));
  const stem = ext ? filePath.slice(0, -ext.length) : filePath;
  return `${stem}.cover.jpg`;
}

export async function saveCoverArt(filePath: string, data: Uint8Array): Promise<string | undefined> {
  const coverPath = coverPathFor(filePath);

  try {
    await writeFile(coverPath, data);
    return pathToFileURL(coverPath).href;
  } catch {
    return undefined;
  }
}

// Comments come back as plain strings from older tag formats and as
// `{ text }` records from newer ones.
function commentText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (value && typeof value === 'object' && 'text' in value && typeof value.text === 'string') {
    return value.text;
  }

  return undefined;
}

export interface ExtractOptions {
  /** Write an embedded picture to the cover side file. Defaults to true. */
  saveCover?: boolean;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

/**
 * Reads the embedded tags of one file. Unreadable or untagged files yield a
 * record with every field absent; this never rejects.
 *
 * When the tags carry a picture it is written next to the file as
 * `<name>.cover.jpg` and `imageUri` points at it, unless `saveCover` is false.
 */
export async function extractMetadata(filePath: string, options: ExtractOptions = {}): Promise<TrackMetadata> {
  try {
    const metadata = await parseFile(filePath, { duration: true });
    const { common, format } = metadata;

    const picture = common.picture?.[0];
    const imageUri = picture && options.saveCover !== false ? await saveCoverArt(filePath, picture.data) : undefined;

    return {
      creator: nonEmpty(common.artist ?? common.artists?.[0]),
      album: nonEmpty(common.album),
      title: nonEmpty(common.title),
      genre: nonEmpty(common.genre?.[0]),
      trackNum: common.track.no ?? undefined,
      durationMs: format.duration !== undefined ? Math.floor(format.duration * 1000) : undefined,
      imageUri,
      identifier: nonEmpty(common.musicbrainz_trackid ?? common.isrc?.[0]),
      annotation: nonEmpty(commentText(common.comment?.[0])),
    };
  } catch {
    return {};
  }
}

export function formatDuration(durationMs: number | undefined): string {
  if (durationMs === undefined) {
    return '';
  }

  const totalSeconds = Math.floor(durationMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const mins = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}:${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  }

  return `${mins}:${secs.toString().padStart(2, '0')}`;
}
