import type { Camera } from './Camera.js';
import { formatNumber } from './common.js';
import { Image, type Pixel } from './Image.js';
import { ProgressCounter } from './ProgressCounter.js';
import type { Scene } from './Scene.js';
import { type TraceStats, traceRay } from './tracer.js';
import { type Random, type RenderSettings, Vec3 } from './types.js';

export interface RendererOptions {
    random?: Random;
    log?: (message: string) => void;
}

// Approximate gamma-2 mapping of a 0..255 linear color, truncated into a byte
export function toPixel(color: Vec3): Pixel {
    const corrected = Vec3.scale(Vec3.sqrt(Vec3.divide(color, 255)), 256);
    const toByte = (c: number) => Math.max(0, Math.min(255, Math.trunc(c)));
    return {
        r: toByte(corrected[0]),
        g: toByte(corrected[1]),
        b: toByte(corrected[2]),
    };
}

export class Renderer {
    private readonly scene: Scene;
    private readonly camera: Camera;
    private readonly settings: RenderSettings;
    private readonly random: Random;
    private readonly log: (message: string) => void;
    private readonly stats: TraceStats = { rays: 0 };

    constructor(
        scene: Scene,
        camera: Camera,
        settings: RenderSettings,
        options: RendererOptions = {}
    ) {
        const { imageWidth, imageHeight, samplesPerPixel, maxDepth } = settings;
        if (!Number.isInteger(imageWidth) || imageWidth < 2) {
            throw new Error(`Image width must be an integer >= 2, got ${imageWidth}`);
        }
        if (!Number.isInteger(imageHeight) || imageHeight < 2) {
            throw new Error(`Image height must be an integer >= 2, got ${imageHeight}`);
        }
        if (!Number.isInteger(samplesPerPixel) || samplesPerPixel < 1) {
            throw new Error(`Samples per pixel must be a positive integer, got ${samplesPerPixel}`);
        }
        if (!Number.isInteger(maxDepth) || maxDepth < 0) {
            throw new Error(`Max depth must be a non-negative integer, got ${maxDepth}`);
        }

        this.scene = scene;
        this.camera = camera;
        this.settings = settings;
        this.random = options.random ?? Math.random;
        this.log = options.log ?? console.log;
    }

    /**
     * Average linear color (0..255 scale) of one pixel. `y` counts rows
     * from the bottom of the picture.
     */
    public samplePixel(x: number, y: number): Vec3 {
        const { imageWidth, imageHeight, samplesPerPixel, maxDepth } =
            this.settings;

        let sum: Vec3 = [0, 0, 0];
        for (let s = 0; s < samplesPerPixel; s++) {
            const u = (x + this.random()) / (imageWidth - 1);
            const v = (y + this.random()) / (imageHeight - 1);
            const ray = this.camera.getRay(u, v);
            // One level for the camera ray plus one per allowed bounce
            sum = Vec3.add(
                sum,
                traceRay(ray, this.scene, maxDepth + 1, this.random, this.stats)
            );
        }

        return Vec3.divide(sum, samplesPerPixel);
    }

    public render(): Image {
        const { imageWidth, imageHeight, samplesPerPixel, maxDepth } =
            this.settings;
        const image = new Image(imageWidth, imageHeight);
        this.stats.rays = 0;

        this.log(
            `Rendering ${imageWidth}x${imageHeight}, ${samplesPerPixel} samples per pixel, max depth ${maxDepth}, ${this.scene.objects.length} objects`
        );
        const progress = new ProgressCounter(
            imageHeight,
            () => performance.now(),
            this.log
        );

        // Image row 0 is the top of the picture, camera v grows upwards
        for (let row = 0; row < imageHeight; row++) {
            const y = imageHeight - 1 - row;
            for (let x = 0; x < imageWidth; x++) {
                image.set(x, row, toPixel(this.samplePixel(x, y)));
            }
            progress.updateProgress(this.stats.rays);
        }

        this.log(
            `Done in ${progress.getElapsedSeconds().toFixed(2)}s, ${formatNumber(this.stats.rays)} rays traced`
        );
        return image;
    }

    public getRayCount(): number {
        return this.stats.rays;
    }
}
