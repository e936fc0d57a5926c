import sharp from "sharp";
import type { Frame } from "./frame";

export const encodeFramePng = (frame: Frame): Promise<Buffer> =>
  sharp(frame.data, { raw: { width: frame.width, height: frame.height, channels: 3 } }).png().toBuffer();
