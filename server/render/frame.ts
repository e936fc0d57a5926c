export type Rgb = readonly [number, number, number];

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

const channel = (value: number): number => Math.min(255, Math.max(0, Math.round(value)));

export const mixRgb = (a: Rgb, b: Rgb, t: number): Rgb => {
  const k = Math.min(1, Math.max(0, t));
  return [channel(a[0] + (b[0] - a[0]) * k), channel(a[1] + (b[1] - a[1]) * k), channel(a[2] + (b[2] - a[2]) * k)];
};

/** Packed 8-bit RGB pixel buffer, row-major, three bytes per pixel. */
export class Frame {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;

  constructor(width: number, height: number, background: Rgb = [0, 0, 0]) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`invalid frame size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = Buffer.alloc(width * height * 3);
    this.fill(background);
  }

  fill(color: Rgb): void {
    for (let offset = 0; offset < this.data.length; offset += 3) {
      this.data[offset] = color[0];
      this.data[offset + 1] = color[1];
      this.data[offset + 2] = color[2];
    }
  }

  setPixel(x: number, y: number, color: Rgb): void {
    const px = Math.floor(x);
    const py = Math.floor(y);
    if (px < 0 || py < 0 || px >= this.width || py >= this.height) return;
    const offset = (py * this.width + px) * 3;
    this.data[offset] = color[0];
    this.data[offset + 1] = color[1];
    this.data[offset + 2] = color[2];
  }

  getPixel(x: number, y: number): Rgb {
    const offset = (Math.floor(y) * this.width + Math.floor(x)) * 3;
    return [this.data[offset] ?? 0, this.data[offset + 1] ?? 0, this.data[offset + 2] ?? 0];
  }

  fillRect(rect: Rect, color: Rgb): void {
    const x0 = Math.max(0, Math.floor(rect.x));
    const y0 = Math.max(0, Math.floor(rect.y));
    const x1 = Math.min(this.width, Math.floor(rect.x + rect.width));
    const y1 = Math.min(this.height, Math.floor(rect.y + rect.height));
    for (let y = y0; y < y1; y += 1) {
      for (let x = x0; x < x1; x += 1) {
        this.setPixel(x, y, color);
      }
    }
  }

  strokeRect(rect: Rect, color: Rgb): void {
    this.fillRect({ x: rect.x, y: rect.y, width: rect.width, height: 1 }, color);
    this.fillRect({ x: rect.x, y: rect.y + rect.height - 1, width: rect.width, height: 1 }, color);
    this.fillRect({ x: rect.x, y: rect.y, width: 1, height: rect.height }, color);
    this.fillRect({ x: rect.x + rect.width - 1, y: rect.y, width: 1, height: rect.height }, color);
  }

  fillCircle(cx: number, cy: number, radius: number, color: Rgb): void {
    const r2 = radius * radius;
    for (let y = Math.floor(cy - radius); y <= Math.ceil(cy + radius); y += 1) {
      for (let x = Math.floor(cx - radius); x <= Math.ceil(cx + radius); x += 1) {
        const dx = x - cx;
        const dy = y - cy;
        if (dx * dx + dy * dy <= r2) this.setPixel(x, y, color);
      }
    }
  }

  strokeCircle(cx: number, cy: number, radius: number, color: Rgb): void {
    const steps = Math.max(16, Math.ceil(radius * 8));
    for (let i = 0; i < steps; i += 1) {
      const angle = (i / steps) * Math.PI * 2;
      this.setPixel(cx + Math.cos(angle) * radius, cy + Math.sin(angle) * radius, color);
    }
  }

  drawLine(x0: number, y0: number, x1: number, y1: number, color: Rgb, thickness = 1): void {
    const steps = Math.max(1, Math.ceil(Math.max(Math.abs(x1 - x0), Math.abs(y1 - y0))));
    const half = Math.max(0, (thickness - 1) / 2);
    for (let i = 0; i <= steps; i += 1) {
      const t = i / steps;
      const x = x0 + (x1 - x0) * t;
      const y = y0 + (y1 - y0) * t;
      if (half > 0) {
        this.fillCircle(x, y, half, color);
      } else {
        this.setPixel(x, y, color);
      }
    }
  }
}
