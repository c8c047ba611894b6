export interface Pixel {
    r: number;
    g: number;
    b: number;
}

/**
 * Fixed-size RGB raster, one byte per channel, stored row-major.
 * Row 0 is the top row of the picture.
 */
export class Image {
    readonly width: number;
    readonly height: number;
    private readonly data: Uint8ClampedArray;

    constructor(width: number, height: number) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new Error(`Invalid image size ${width}x${height}`);
        }
        this.width = width;
        this.height = height;
        this.data = new Uint8ClampedArray(width * height * 3);
    }

    private offset(x: number, y: number): number {
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
            throw new RangeError(
                `Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} image`
            );
        }
        return (y * this.width + x) * 3;
    }

    set(x: number, y: number, pixel: Pixel): void {
        const offset = this.offset(x, y);
        this.data[offset] = pixel.r;
        this.data[offset + 1] = pixel.g;
        this.data[offset + 2] = pixel.b;
    }

    get(x: number, y: number): Pixel {
        const offset = this.offset(x, y);
        return {
            r: this.data[offset],
            g: this.data[offset + 1],
            b: this.data[offset + 2],
        };
    }

    // Plain-text PPM (P3), one "r g b" line per pixel starting at the top row
    toPPM(): string {
        const lines = [`P3`, `${this.width} ${this.height}`, '255'];
        for (let offset = 0; offset < this.data.length; offset += 3) {
            lines.push(
                `${this.data[offset]} ${this.data[offset + 1]} ${this.data[offset + 2]}`
            );
        }
        return lines.join('\n') + '\n';
    }
}
