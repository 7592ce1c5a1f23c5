import { describe, it, expect } from 'vitest';
import { RasterCanvas } from '../src/utils/raster';
import type { Rgba } from '../src/utils/raster';

const INK: Rgba = [10, 20, 30, 255];

// One string per row: '#' for any non-transparent pixel
const mask = (canvas: RasterCanvas): string[] => {
    const rows: string[] = [];
    for (let y = 0; y < canvas.height; y++) {
        let row = '';
        for (let x = 0; x < canvas.width; x++) {
            row += canvas.getPixel(x, y)[3] === 0 ? '.' : '#';
        }
        rows.push(row);
    }
    return rows;
};

describe('RasterCanvas', () => {
    it('starts fully transparent', () => {
        const canvas = new RasterCanvas(3, 2);
        expect(canvas.data.length).toBe(24);
        expect(canvas.data.every((byte) => byte === 0)).toBe(true);
    });

    it('sets and reads back a pixel', () => {
        const canvas = new RasterCanvas(4, 4);
        canvas.setPixel(2, 1, INK);
        expect(canvas.getPixel(2, 1)).toEqual([10, 20, 30, 255]);
        expect(canvas.getPixel(1, 2)).toEqual([0, 0, 0, 0]);
    });

    it('ignores out-of-bounds writes and reads transparent there', () => {
        const canvas = new RasterCanvas(2, 2);
        canvas.setPixel(-1, 0, INK);
        canvas.setPixel(2, 1, INK);
        expect(canvas.getPixel(5, 5)).toEqual([0, 0, 0, 0]);
        expect(mask(canvas)).toEqual(['..', '..']);
    });

    it('fills a rectangle including both corners', () => {
        const canvas = new RasterCanvas(5, 4);
        canvas.fillRect([1, 1, 3, 2], INK);
        expect(mask(canvas)).toEqual(['.....', '.###.', '.###.', '.....']);
    });

    it('clips a rectangle larger than the canvas', () => {
        const canvas = new RasterCanvas(3, 3);
        canvas.fillRect([-5, -5, 100, 100], INK);
        expect(mask(canvas)).toEqual(['###', '###', '###']);
    });

    it('fills an ellipse inscribed in its box', () => {
        const canvas = new RasterCanvas(5, 5);
        canvas.fillEllipse([0, 0, 4, 4], INK);
        expect(mask(canvas)).toEqual(['.###.', '#####', '#####', '#####', '.###.']);
    });

    it('draws nothing for an inverted ellipse box', () => {
        const canvas = new RasterCanvas(5, 5);
        canvas.fillEllipse([3, 3, 1, 1], INK);
        expect(mask(canvas).join('')).toBe('.'.repeat(25));
    });

    it('strokes only the lower half for a 0 to 180 degree arc', () => {
        const canvas = new RasterCanvas(9, 9);
        canvas.strokeArc([0, 0, 8, 8], 0, 180, INK, 1);
        expect(mask(canvas)).toEqual([
            '.........',
            '.........',
            '.........',
            '.........',
            '#.......#',
            '#.......#',
            '##.....##',
            '.##...##.',
            '..#####..',
        ]);
    });

    it('grows an arc stroke inward', () => {
        const canvas = new RasterCanvas(9, 9);
        canvas.strokeArc([0, 0, 8, 8], 0, 360, INK, 2);
        expect(mask(canvas)).toEqual([
            '..#####..',
            '.#######.',
            '###...###',
            '##.....##',
            '##.....##',
            '##.....##',
            '###...###',
            '.#######.',
            '..#####..',
        ]);
    });

    it('strokes a vertical line exactly `width` pixels wide', () => {
        const canvas = new RasterCanvas(9, 7);
        canvas.strokeLine([4, 1], [4, 5], INK, 3);
        expect(mask(canvas)).toEqual([
            '.........',
            '...###...',
            '...###...',
            '...###...',
            '...###...',
            '...###...',
            '.........',
        ]);
    });

    it('puts the extra row of an even-width horizontal line below it', () => {
        const canvas = new RasterCanvas(8, 7);
        canvas.strokeLine([1, 4], [6, 4], INK, 2);
        expect(mask(canvas)).toEqual([
            '........',
            '........',
            '........',
            '........',
            '.######.',
            '.######.',
            '........',
        ]);
    });

    it('later draws overwrite earlier ones', () => {
        const canvas = new RasterCanvas(3, 3);
        const over: Rgba = [1, 2, 3, 255];
        canvas.fillRect([0, 0, 2, 2], INK);
        canvas.strokeLine([0, 1], [2, 1], over, 1);
        expect(canvas.getPixel(1, 0)).toEqual([10, 20, 30, 255]);
        expect(canvas.getPixel(1, 1)).toEqual([1, 2, 3, 255]);
    });
});
