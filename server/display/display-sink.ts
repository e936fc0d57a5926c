import { open, type FileHandle } from "node:fs/promises";
import type { Frame } from "../render/frame";
import { createLogger } from "../utils/log";

const log = createLogger("display");

export class DisplayError extends Error {
  readonly device: string;

  constructor(message: string, device: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DisplayError";
    this.device = device;
  }
}

export interface DisplaySink {
  open(): Promise<void>;
  write(frame: Frame): Promise<void>;
  close(): Promise<void>;
}

/**
 * Converts packed RGB to little-endian RGB565 at the target size, sampling the
 * source by nearest neighbour when the sizes differ.
 */
export const toRgb565 = (frame: Frame, width: number = frame.width, height: number = frame.height): Buffer => {
  const out = Buffer.alloc(width * height * 2);
  for (let y = 0; y < height; y += 1) {
    const sy = Math.min(frame.height - 1, Math.floor((y * frame.height) / height));
    for (let x = 0; x < width; x += 1) {
      const sx = Math.min(frame.width - 1, Math.floor((x * frame.width) / width));
      const src = (sy * frame.width + sx) * 3;
      const r = frame.data[src] ?? 0;
      const g = frame.data[src + 1] ?? 0;
      const b = frame.data[src + 2] ?? 0;
      out.writeUInt16LE(((r >> 3) << 11) | ((g >> 2) << 5) | (b >> 3), (y * width + x) * 2);
    }
  }
  return out;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Linux framebuffer device in 16-bit RGB565. */
export class FramebufferSink implements DisplaySink {
  private handle: FileHandle | null = null;

  constructor(
    private readonly device: string,
    private readonly width: number,
    private readonly height: number,
  ) {}

  async open(): Promise<void> {
    if (this.handle) return;
    try {
      this.handle = await open(this.device, "r+");
    } catch (error) {
      throw new DisplayError(`cannot open framebuffer ${this.device}: ${describeError(error)}`, this.device, {
        cause: error,
      });
    }
    log.info(`framebuffer ${this.device} opened (${this.width}x${this.height})`);
  }

  async write(frame: Frame): Promise<void> {
    if (!this.handle) {
      throw new DisplayError("framebuffer is not open", this.device);
    }
    const pixels = toRgb565(frame, this.width, this.height);
    await this.handle.write(pixels, 0, pixels.length, 0);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
      log.info(`framebuffer ${this.device} closed`);
    }
  }
}

/** Headless sink: remembers the latest frame and counts writes. */
export class MemorySink implements DisplaySink {
  opened = false;
  writes = 0;
  lastFrame: Frame | null = null;

  async open(): Promise<void> {
    this.opened = true;
  }

  async write(frame: Frame): Promise<void> {
    this.writes += 1;
    this.lastFrame = frame;
  }

  async close(): Promise<void> {
    this.opened = false;
  }
}
