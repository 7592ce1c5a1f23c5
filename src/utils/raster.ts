export type Rgba = readonly [r: number, g: number, b: number, a: number];

/** Inclusive pixel bounds: `[x0, y0, x1, y1]` covers both corner pixels. */
export type Box = readonly [x0: number, y0: number, x1: number, y1: number];

export type Point = readonly [x: number, y: number];

const TRANSPARENT: Rgba = [0, 0, 0, 0];

const normalizeAngle = (degrees: number): number => ((degrees % 360) + 360) % 360;

const angleWithin = (angle: number, start: number, end: number): boolean => {
    const sweep = end - start;
    if (sweep >= 360) return true;
    if (sweep < 0) return false;
    return normalizeAngle(angle - start) <= sweep;
};

/**
 * RGBA pixel buffer with the handful of primitives the icon needs.
 *
 * Every primitive overwrites the pixels it covers (no blending) and silently
 * clips to the canvas. Ellipses are inscribed in their inclusive box and
 * tested at pixel centers; lines use butt caps and cover exactly `width`
 * pixels across when axis-aligned.
 */
export class RasterCanvas {
    readonly width: number;
    readonly height: number;
    readonly data: Uint8ClampedArray;

    constructor(width: number, height: number) {
        this.width = width;
        this.height = height;
        this.data = new Uint8ClampedArray(width * height * 4);
    }

    private index(x: number, y: number): number {
        return (y * this.width + x) * 4;
    }

    private contains(x: number, y: number): boolean {
        return x >= 0 && y >= 0 && x < this.width && y < this.height;
    }

    setPixel(x: number, y: number, color: Rgba): void {
        if (!this.contains(x, y)) return;
        const idx = this.index(x, y);
        this.data[idx] = color[0];
        this.data[idx + 1] = color[1];
        this.data[idx + 2] = color[2];
        this.data[idx + 3] = color[3];
    }

    getPixel(x: number, y: number): Rgba {
        if (!this.contains(x, y)) return TRANSPARENT;
        const idx = this.index(x, y);
        return [this.data[idx], this.data[idx + 1], this.data[idx + 2], this.data[idx + 3]];
    }

    /** Visits every in-bounds pixel of `box`. */
    private scan(box: Box, visit: (x: number, y: number) => void): void {
        const x0 = Math.max(0, Math.floor(box[0]));
        const y0 = Math.max(0, Math.floor(box[1]));
        const x1 = Math.min(this.width - 1, Math.floor(box[2]));
        const y1 = Math.min(this.height - 1, Math.floor(box[3]));

        for (let y = y0; y <= y1; y += 1) {
            for (let x = x0; x <= x1; x += 1) {
                visit(x, y);
            }
        }
    }

    fillRect(box: Box, color: Rgba): void {
        this.scan(box, (x, y) => this.setPixel(x, y, color));
    }

    fillEllipse(box: Box, color: Rgba): void {
        const [x0, y0, x1, y1] = box;
        if (x1 < x0 || y1 < y0) return;

        const cx = (x0 + x1 + 1) / 2;
        const cy = (y0 + y1 + 1) / 2;
        const rx = (x1 - x0 + 1) / 2;
        const ry = (y1 - y0 + 1) / 2;

        this.scan(box, (x, y) => {
            const dx = (x + 0.5 - cx) / rx;
            const dy = (y + 0.5 - cy) / ry;
            if (dx * dx + dy * dy <= 1) this.setPixel(x, y, color);
        });
    }

    /**
     * Strokes the part of the ellipse inscribed in `box` between `start` and
     * `end` degrees, measured clockwise from 3 o'clock. The stroke grows
     * inward from the ellipse edge.
     */
    strokeArc(box: Box, start: number, end: number, color: Rgba, width: number): void {
        const [x0, y0, x1, y1] = box;
        if (x1 < x0 || y1 < y0 || width <= 0) return;

        const cx = (x0 + x1 + 1) / 2;
        const cy = (y0 + y1 + 1) / 2;
        const rx = (x1 - x0 + 1) / 2;
        const ry = (y1 - y0 + 1) / 2;
        const innerRx = rx - width;
        const innerRy = ry - width;
        const hollow = innerRx > 0 && innerRy > 0;

        this.scan(box, (x, y) => {
            const px = x + 0.5 - cx;
            const py = y + 0.5 - cy;

            const outer = (px / rx) ** 2 + (py / ry) ** 2;
            if (outer > 1) return;
            if (hollow && (px / innerRx) ** 2 + (py / innerRy) ** 2 < 1) return;

            const angle = normalizeAngle((Math.atan2(py, px) * 180) / Math.PI);
            if (angleWithin(angle, start, end)) this.setPixel(x, y, color);
        });
    }

    strokeLine(from: Point, to: Point, color: Rgba, width: number): void {
        if (width <= 0) return;

        const [ax, ay] = from;
        const [bx, by] = to;
        const length = Math.hypot(bx - ax, by - ay);
        // A zero-length segment is stroked as if it ran along the x axis.
        const ux = length === 0 ? 1 : (bx - ax) / length;
        const uy = length === 0 ? 0 : (by - ay) / length;
        const half = width / 2;
        const reach = Math.ceil(half) + 1;

        const bounds: Box = [
            Math.min(ax, bx) - reach,
            Math.min(ay, by) - reach,
            Math.max(ax, bx) + reach,
            Math.max(ay, by) + reach,
        ];

        this.scan(bounds, (x, y) => {
            const dx = x - ax;
            const dy = y - ay;
            const along = dx * ux + dy * uy;
            const across = dx * uy - dy * ux;
            if (along < 0 || along > length) return;
            if (across >= -half && across < half) this.setPixel(x, y, color);
        });
    }
}
