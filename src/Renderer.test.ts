import { describe, expect, test } from 'vitest';
import { Camera } from './Camera.js';
import { Lambertian } from './materials.js';
import { seededRandom } from './math.js';
import { Renderer, toPixel } from './Renderer.js';
import { Scene } from './Scene.js';
import { Sphere } from './Sphere.js';
import type { RenderSettings } from './types.js';

const quiet = () => {};

function diffuseSphereScene(): Scene {
    return new Scene([
        new Sphere([0, 0, -1], 0.5, new Lambertian([0.5, 0.5, 0.5])),
    ]);
}

// Square viewport so pixel (5, 5) of an 11x11 image looks at the sphere
const camera = new Camera([0, 0, 0], 2, 2, 1);

function settings(overrides: Partial<RenderSettings> = {}): RenderSettings {
    return {
        imageWidth: 11,
        imageHeight: 11,
        samplesPerPixel: 1,
        maxDepth: 1,
        ...overrides,
    };
}

describe('toPixel', () => {
    test('black stays black', () => {
        expect(toPixel([0, 0, 0])).toEqual({ r: 0, g: 0, b: 0 });
    });

    test('applies gamma 2 and truncates', () => {
        // sqrt(0.25) * 256 = 128, sqrt(0.5) * 256 = 181.02
        expect(toPixel([63.75, 127.5, 0])).toEqual({ r: 128, g: 181, b: 0 });
    });

    test('full intensity clamps to 255', () => {
        expect(toPixel([255, 255, 255])).toEqual({ r: 255, g: 255, b: 255 });
        expect(toPixel([400, 254, 0])).toEqual({ r: 255, g: 255, b: 0 });
    });
});

describe('Renderer', () => {
    test('diffuse sphere is darker than the sky around it', () => {
        const renderer = new Renderer(diffuseSphereScene(), camera, settings(), {
            random: seededRandom(3),
            log: quiet,
        });
        const image = renderer.render();

        const center = image.get(5, 5);
        const corner = image.get(0, 0);

        expect(center.r + center.g + center.b).toBeGreaterThan(0);
        expect(corner).toEqual(expect.objectContaining({ b: 255 }));
        expect(center.g).toBeLessThan(corner.g);
        expect(center.b).toBeLessThan(corner.b);
    });

    test('max depth 0 renders the sphere black', () => {
        const renderer = new Renderer(
            diffuseSphereScene(),
            camera,
            settings({ maxDepth: 0 }),
            { random: seededRandom(3), log: quiet }
        );
        const image = renderer.render();

        expect(image.get(5, 5)).toEqual({ r: 0, g: 0, b: 0 });
        expect(image.get(0, 0).b).toBe(255);
    });

    test('top row of the image shows the top of the scene', () => {
        // Sky is bluer (less red) towards the zenith
        const renderer = new Renderer(new Scene(), camera, settings(), {
            random: seededRandom(4),
            log: quiet,
        });
        const image = renderer.render();
        expect(image.get(5, 0).r).toBeLessThan(image.get(5, 10).r);
    });

    test('pixel mean is stable as the sample count grows', () => {
        const few = new Renderer(
            diffuseSphereScene(),
            camera,
            settings({ samplesPerPixel: 64 }),
            { random: seededRandom(11), log: quiet }
        );
        const many = new Renderer(
            diffuseSphereScene(),
            camera,
            settings({ samplesPerPixel: 1024 }),
            { random: seededRandom(11), log: quiet }
        );

        const a = few.samplePixel(5, 5);
        const b = many.samplePixel(5, 5);
        for (let channel = 0; channel < 3; channel++) {
            expect(Math.abs(a[channel] - b[channel])).toBeLessThan(12);
        }
    });

    test('logs the render parameters and counts rays', () => {
        const messages: string[] = [];
        const renderer = new Renderer(diffuseSphereScene(), camera, settings(), {
            random: seededRandom(5),
            log: (message) => messages.push(message),
        });
        renderer.render();

        expect(messages[0]).toBe(
            'Rendering 11x11, 1 samples per pixel, max depth 1, 1 objects'
        );
        expect(messages[messages.length - 1]).toMatch(/^Done in \d+\.\d{2}s, .+ rays traced$/);
        // Every pixel traces at least its camera ray
        expect(renderer.getRayCount()).toBeGreaterThanOrEqual(121);
    });

    test('each render counts its own rays', () => {
        const messages: string[] = [];
        const renderer = new Renderer(
            new Scene(),
            camera,
            settings({ imageWidth: 2, imageHeight: 2 }),
            { random: seededRandom(6), log: (message) => messages.push(message) }
        );

        // One camera ray per pixel, all of them miss
        renderer.render();
        expect(renderer.getRayCount()).toBe(4);
        renderer.render();
        expect(renderer.getRayCount()).toBe(4);
        expect(messages[messages.length - 1]).toMatch(/, 4 rays traced$/);
    });

    test('rejects unusable settings', () => {
        const scene = new Scene();
        expect(() => new Renderer(scene, camera, settings({ imageWidth: 1 }))).toThrow(
            'Image width must be an integer >= 2, got 1'
        );
        expect(() => new Renderer(scene, camera, settings({ samplesPerPixel: 0 }))).toThrow(
            'Samples per pixel must be a positive integer, got 0'
        );
        expect(() => new Renderer(scene, camera, settings({ maxDepth: -1 }))).toThrow(
            'Max depth must be a non-negative integer, got -1'
        );
    });
});
