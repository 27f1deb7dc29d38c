/**
 * Audio file helpers: WAV header parsing and encoding, file info, level
 * metering for 16-bit PCM, and temp file cleanup. Compressed formats are passed
 * through untouched; only their size and extension are known here.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../config/logger';
import { isErrnoCode, ValidationError } from './errors';

export interface WavHeader {
  /** 1 = PCM, 3 = IEEE float, 0xFFFE = extensible */
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  byteRate: number;
  blockAlign: number;
  dataOffset: number;
  dataSize: number;
}

export interface AudioInfo {
  format: string;
  fileSize: number;
  fileSizeMb: number;
  duration?: number;
  sampleRate?: number;
  channels?: number;
  bitsPerSample?: number;
  frames?: number;
}

export interface AudioLevel {
  peak: number;
  rms: number;
  samples: number;
}

export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample?: number;
}

const HEADER_READ_BYTES = 4096;

/**
 * Walk the RIFF chunks of a WAV file. Returns null when the buffer is not a
 * WAV or the fmt chunk is missing. Works on a truncated buffer as long as the
 * fmt and data chunk headers fit in it.
 */
export function parseWavHeader(buf: Buffer, fileSize: number = buf.length): WavHeader | null {
  if (buf.length < 12) return null;
  if (buf.toString('ascii', 0, 4) !== 'RIFF') return null;
  if (buf.toString('ascii', 8, 12) !== 'WAVE') return null;

  let fmt: Omit<WavHeader, 'dataOffset' | 'dataSize'> | null = null;
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const chunkId = buf.toString('ascii', offset, offset + 4);
    const chunkSize = buf.readUInt32LE(offset + 4);
    offset += 8;

    if (chunkId === 'fmt ') {
      if (offset + 16 > buf.length) return null;
      fmt = {
        audioFormat: buf.readUInt16LE(offset),
        channels: buf.readUInt16LE(offset + 2),
        sampleRate: buf.readUInt32LE(offset + 4),
        byteRate: buf.readUInt32LE(offset + 8),
        blockAlign: buf.readUInt16LE(offset + 12),
        bitsPerSample: buf.readUInt16LE(offset + 14),
      };
    } else if (chunkId === 'data') {
      if (!fmt) return null;
      // Streamed recorders leave the size at 0 or 0xFFFFFFFF.
      const available = Math.max(0, fileSize - offset);
      const dataSize = chunkSize === 0 || chunkSize > available ? available : chunkSize;
      return { ...fmt, dataOffset: offset, dataSize };
    }

    offset += chunkSize + (chunkSize % 2);
  }
  return null;
}

/** Wrap raw little-endian PCM in a 44-byte RIFF/WAVE header. */
export function encodeWav(pcm: Buffer, format: PcmFormat): Buffer {
  const bitsPerSample = format.bitsPerSample ?? 16;
  const { sampleRate, channels } = format;
  const blockAlign = (channels * bitsPerSample) / 8;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8);
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36);
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

export function durationOf(header: WavHeader): number {
  return header.byteRate > 0 ? header.dataSize / header.byteRate : 0;
}

export function formatFromFileName(fileName: string): string {
  return path.extname(fileName).replace(/^\./, '').toLowerCase();
}

async function readHead(filePath: string): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buf = Buffer.alloc(HEADER_READ_BYTES);
    const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
    return buf.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export function audioInfoFromBuffer(buf: Buffer, fileName: string): AudioInfo {
  return buildInfo(buf, buf.length, fileName);
}

function buildInfo(head: Buffer, fileSize: number, fileName: string): AudioInfo {
  const info: AudioInfo = {
    format: formatFromFileName(fileName),
    fileSize,
    fileSizeMb: fileSize / (1024 * 1024),
  };
  const wav = parseWavHeader(head, fileSize);
  if (wav) {
    info.format = 'wav';
    info.duration = durationOf(wav);
    info.sampleRate = wav.sampleRate;
    info.channels = wav.channels;
    info.bitsPerSample = wav.bitsPerSample;
    info.frames = wav.blockAlign > 0 ? Math.floor(wav.dataSize / wav.blockAlign) : 0;
  }
  return info;
}

export async function getAudioInfo(filePath: string): Promise<AudioInfo> {
  const stat = await fs.promises.stat(filePath);
  const head = await readHead(filePath);
  return buildInfo(head, stat.size, filePath);
}

/** Duration in seconds, or null when the container does not expose it. */
export async function getAudioDuration(filePath: string): Promise<number | null> {
  const info = await getAudioInfo(filePath);
  return info.duration ?? null;
}

/** Peak and RMS level (0..1) of bare 16-bit little-endian PCM samples. */
export function measurePcmLevel(pcm: Buffer, start = 0, end: number = pcm.length): AudioLevel {
  const samples = Math.floor((end - start) / 2);
  if (samples <= 0) return { peak: 0, rms: 0, samples: 0 };

  let peak = 0;
  let sumSquares = 0;
  for (let i = 0; i < samples; i++) {
    const s = pcm.readInt16LE(start + i * 2) / 32768;
    const abs = Math.abs(s);
    if (abs > peak) peak = abs;
    sumSquares += s * s;
  }

  return {
    peak: Math.min(peak, 1),
    rms: Math.sqrt(sumSquares / samples),
    samples,
  };
}

function pcmWav(audio: Buffer): WavHeader {
  const wav = parseWavHeader(audio);
  if (!wav || wav.audioFormat !== 1 || wav.bitsPerSample !== 16) {
    throw new ValidationError('Only 16-bit PCM WAV recordings can be measured');
  }
  return wav;
}

/** Peak and RMS level of a 16-bit PCM WAV file, over its data chunk. */
export function measureLevel(audio: Buffer): AudioLevel {
  const wav = pcmWav(audio);
  return measurePcmLevel(audio, wav.dataOffset, Math.min(audio.length, wav.dataOffset + wav.dataSize));
}

/**
 * RMS level per `chunkSeconds` of a 16-bit PCM WAV file, all channels
 * together. The last chunk may be shorter.
 */
export function measureLevelMeter(audio: Buffer, chunkSeconds = 0.1): number[] {
  if (!(chunkSeconds > 0)) throw new ValidationError('Chunk length must be positive');
  const wav = pcmWav(audio);
  const end = Math.min(audio.length, wav.dataOffset + wav.dataSize);
  const chunkBytes = Math.max(1, Math.floor(chunkSeconds * wav.sampleRate)) * wav.channels * 2;

  const levels: number[] = [];
  for (let offset = wav.dataOffset; offset + 2 <= end; offset += chunkBytes) {
    levels.push(measurePcmLevel(audio, offset, Math.min(end, offset + chunkBytes)).rms);
  }
  return levels;
}

/** YYYYMMDD_HHMMSS in local time. */
export function timestampSlug(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

const CLEANABLE_EXTENSIONS = new Set(['.wav', '.mp3', '.ogg', '.webm']);

/** Delete audio files in `dir` older than `maxAgeHours`. Returns the count removed. */
export async function cleanTempFiles(dir: string, maxAgeHours = 24, now: number = Date.now()): Promise<number> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isErrnoCode(e, 'ENOENT')) return 0;
    throw e;
  }

  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  let deleted = 0;
  for (const entry of entries) {
    if (!entry.isFile() || !CLEANABLE_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) continue;
    const filePath = path.join(dir, entry.name);
    const stat = await fs.promises.stat(filePath);
    if (now - stat.mtimeMs > maxAgeMs) {
      await fs.promises.unlink(filePath);
      deleted++;
    }
  }

  if (deleted > 0) logger.info('Cleaned old temporary files', { dir, deleted });
  return deleted;
}
