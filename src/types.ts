export type Vec3 = [number, number, number];

export namespace Vec3 {
    export function add(a: Vec3, b: Vec3): Vec3 {
        return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
    }

    export function subtract(a: Vec3, b: Vec3): Vec3 {
        return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
    }

    export function multiply(a: Vec3, b: Vec3): Vec3 {
        return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
    }

    export function scale(v: Vec3, s: number): Vec3 {
        return [v[0] * s, v[1] * s, v[2] * s];
    }

    export function divide(v: Vec3, s: number): Vec3 {
        return [v[0] / s, v[1] / s, v[2] / s];
    }

    export function negate(v: Vec3): Vec3 {
        return [-v[0], -v[1], -v[2]];
    }

    export function dot(a: Vec3, b: Vec3): number {
        return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
    }

    export function cross(a: Vec3, b: Vec3): Vec3 {
        return [
            a[1] * b[2] - a[2] * b[1],
            a[2] * b[0] - a[0] * b[2],
            a[0] * b[1] - a[1] * b[0],
        ];
    }

    export function lengthSquared(v: Vec3): number {
        return dot(v, v);
    }

    export function length(v: Vec3): number {
        return Math.sqrt(lengthSquared(v));
    }

    // A zero-length vector normalizes to [0, 0, 0]
    export function normalize(v: Vec3): Vec3 {
        const len = length(v);
        return len > 0 ? [v[0] / len, v[1] / len, v[2] / len] : [0, 0, 0];
    }

    export function sqrt(v: Vec3): Vec3 {
        return [Math.sqrt(v[0]), Math.sqrt(v[1]), Math.sqrt(v[2])];
    }

    export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
        return add(scale(a, 1 - t), scale(b, t));
    }

    export function nearZero(v: Vec3, epsilon = 1e-8): boolean {
        return (
            Math.abs(v[0]) < epsilon &&
            Math.abs(v[1]) < epsilon &&
            Math.abs(v[2]) < epsilon
        );
    }
}

export interface Ray {
    origin: Vec3;
    direction: Vec3; // not necessarily unit length
}

export namespace Ray {
    export function at(ray: Ray, t: number): Vec3 {
        return Vec3.add(ray.origin, Vec3.scale(ray.direction, t));
    }
}

// Uniform generator over [0, 1)
export type Random = () => number;

export interface ScatterResult {
    attenuation: Vec3;
    scattered: Ray;
}

export interface Material {
    // Returns null when the incoming light is absorbed
    scatter(ray: Ray, hit: HitRecord, random: Random): ScatterResult | null;
}

export interface HitRecord {
    point: Vec3;
    normal: Vec3; // unit length, always facing against the incoming ray
    t: number;
    frontFace: boolean;
    material: Material;
}

export interface Hittable {
    hit(ray: Ray, tMin: number, tMax: number): HitRecord | null;
}

export interface RenderSettings {
    imageWidth: number;
    imageHeight: number;
    samplesPerPixel: number;
    maxDepth: number; // maximum number of scattering events per sample
}

// Scene description as stored in the JSON scene files

type RawLambertian = {
    type: 'lambertian';
    albedo: Vec3;
};

type RawMetal = {
    type: 'metal';
    albedo: Vec3;
    fuzz: number;
};

type RawDielectric = {
    type: 'dielectric';
    refractionIndex: number;
};

export type RawMaterial = RawLambertian | RawMetal | RawDielectric;

export type RawSphere = {
    center: Vec3;
    radius: number;
    material: string;
};

export type RawCamera = {
    origin: Vec3;
    viewportHeight: number;
    focalLength: number;
    lookAt?: Vec3;
    up?: Vec3;
};

export type RawSettings = {
    aspectRatio: number;
    imageHeight: number;
    samplesPerPixel: number;
    maxDepth: number;
    seed?: number;
};

export type RawScene = {
    settings: RawSettings;
    camera: RawCamera;
    materials: Record<string, RawMaterial>;
    spheres: RawSphere[];
};
