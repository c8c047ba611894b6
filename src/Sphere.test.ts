import { describe, expect, test } from 'vitest';
import { Lambertian } from './materials.js';
import { Sphere } from './Sphere.js';
import { type Ray, Vec3 } from './types.js';

const gray = new Lambertian([0.5, 0.5, 0.5]);

function expectVec(actual: Vec3 | undefined, expected: Vec3) {
    expect(actual).toBeDefined();
    const [x, y, z] = actual ?? [NaN, NaN, NaN];
    expect(x).toBeCloseTo(expected[0], 12);
    expect(y).toBeCloseTo(expected[1], 12);
    expect(z).toBeCloseTo(expected[2], 12);
}

describe('Sphere.hit', () => {
    const sphere = new Sphere([0, 0, -3], 1, gray);

    test('ray aimed at the center hits at distance minus radius', () => {
        const ray: Ray = { origin: [0, 0, 0], direction: [0, 0, -1] };
        const hit = sphere.hit(ray, 0.001, Infinity);

        expect(hit).not.toBeNull();
        expect(hit?.t).toBe(2);
        expect(hit?.point).toEqual([0, 0, -2]);
        expect(hit?.normal).toEqual([0, 0, 1]);
        expect(hit?.frontFace).toBe(true);
        expect(hit?.material).toBe(gray);
        // Normal is parallel to the ray, facing back at it
        expect(Vec3.dot(hit?.normal ?? [0, 0, 0], ray.direction)).toBe(-1);
    });

    test('t is measured in units of the direction length', () => {
        const hit = sphere.hit(
            { origin: [0, 0, 0], direction: [0, 0, -2] },
            0.001,
            Infinity
        );
        expect(hit?.t).toBe(1);
        expect(hit?.point).toEqual([0, 0, -2]);
    });

    test('ray offset by more than the radius misses', () => {
        const hit = sphere.hit(
            { origin: [2, 0, 0], direction: [0, 0, -1] },
            0.001,
            Infinity
        );
        expect(hit).toBeNull();
    });

    test('ray pointing away misses', () => {
        const hit = sphere.hit(
            { origin: [0, 0, 0], direction: [0, 0, 1] },
            0.001,
            Infinity
        );
        expect(hit).toBeNull();
    });

    test('roots outside the interval are rejected', () => {
        const ray: Ray = { origin: [0, 0, 0], direction: [0, 0, -1] };
        expect(sphere.hit(ray, 0.001, 1.5)).toBeNull();
        expect(sphere.hit(ray, 0.001, 2)).toBeNull();
    });

    test('falls back to the far root when the near one is too close', () => {
        const ray: Ray = { origin: [0, 0, 0], direction: [0, 0, -1] };
        const hit = sphere.hit(ray, 2.5, Infinity);

        expect(hit?.t).toBe(4);
        expect(hit?.point).toEqual([0, 0, -4]);
        expectVec(hit?.normal, [0, 0, 1]);
        expect(hit?.frontFace).toBe(false);
    });

    test('hit from inside flips the normal against the ray', () => {
        const ray: Ray = { origin: [0, 0, -3], direction: [0, 0, -1] };
        const hit = sphere.hit(ray, 0.001, Infinity);

        expect(hit?.t).toBe(1);
        expectVec(hit?.normal, [0, 0, 1]);
        expect(hit?.frontFace).toBe(false);
    });

    test('normals are unit length for off-center hits', () => {
        const big = new Sphere([0.5, -0.25, -4], 1.75, gray);
        const origins: Vec3[] = [
            [0.3, 0.2, 0],
            [-0.9, 0.4, 0.5],
            [1.2, -1, 0],
        ];
        for (const origin of origins) {
            const hit = big.hit(
                { origin, direction: [0, 0, -1] },
                0.001,
                Infinity
            );
            expect(hit).not.toBeNull();
            expect(Vec3.length(hit?.normal ?? [0, 0, 0])).toBeCloseTo(1, 12);
        }
    });
});

describe('Sphere constructor', () => {
    test('rejects non-positive radius', () => {
        expect(() => new Sphere([0, 0, 0], 0, gray)).toThrow(
            'Sphere radius must be positive, got 0'
        );
        expect(() => new Sphere([0, 0, 0], -1, gray)).toThrow(
            'Sphere radius must be positive, got -1'
        );
        expect(() => new Sphere([0, 0, 0], NaN, gray)).toThrow();
    });
});
