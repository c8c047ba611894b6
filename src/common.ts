import { readFile, writeFile } from 'fs/promises';
import { Camera } from './Camera.js';
import type { Image } from './Image.js';
import { Dielectric, Lambertian, Metal } from './materials.js';
import { seededRandom } from './math.js';
import { Scene } from './Scene.js';
import { Sphere } from './Sphere.js';
import type {
    Material,
    Random,
    RawCamera,
    RawMaterial,
    RawScene,
    RawSettings,
    RawSphere,
    RenderSettings,
    Vec3,
} from './types.js';

export function reportError(error: unknown): void {
    const message =
        error instanceof Error ? (error.stack ?? error.message) : String(error);
    console.error('Render failed:', message);
}

export class RethrownError extends Error {
    original_error: Error;
    stack_before_rethrow: string | undefined;

    constructor(message: string, error: unknown) {
        super(message);
        this.name = this.constructor.name;
        this.original_error =
            error instanceof Error ? error : new Error(String(error));
        this.stack_before_rethrow = this.stack;
        const message_lines = (this.message.match(/\n/g) || []).length + 1;
        this.stack =
            this.stack
                ?.split('\n')
                .slice(0, message_lines + 1)
                .join('\n') +
            '\n' +
            this.original_error.stack;
    }
}

// Thrown for scene files that parse as JSON but describe an invalid scene
export class SceneFormatError extends Error {
    constructor(path: string, problem: string) {
        super(`${path}: ${problem}`);
        this.name = this.constructor.name;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown, path: string): Record<string, unknown> {
    if (!isRecord(value)) {
        throw new SceneFormatError(path, 'expected an object');
    }
    return value;
}

function readNumber(
    value: unknown,
    path: string,
    range: { min?: number; max?: number; integer?: boolean } = {}
): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new SceneFormatError(path, 'expected a finite number');
    }
    if (range.integer && !Number.isInteger(value)) {
        throw new SceneFormatError(path, `expected an integer, got ${value}`);
    }
    if (range.min !== undefined && value < range.min) {
        throw new SceneFormatError(path, `must be >= ${range.min}, got ${value}`);
    }
    if (range.max !== undefined && value > range.max) {
        throw new SceneFormatError(path, `must be <= ${range.max}, got ${value}`);
    }
    return value;
}

function readVec3(
    value: unknown,
    path: string,
    range: { min?: number; max?: number } = {}
): Vec3 {
    if (!Array.isArray(value) || value.length !== 3) {
        throw new SceneFormatError(path, 'expected an array of 3 numbers');
    }
    return [
        readNumber(value[0], `${path}[0]`, range),
        readNumber(value[1], `${path}[1]`, range),
        readNumber(value[2], `${path}[2]`, range),
    ];
}

function parseSettings(value: unknown): RawSettings {
    const raw = readRecord(value, 'settings');
    const settings: RawSettings = {
        aspectRatio: readNumber(raw.aspectRatio, 'settings.aspectRatio', { min: 0.01 }),
        imageHeight: readNumber(raw.imageHeight, 'settings.imageHeight', { min: 2, integer: true }),
        samplesPerPixel: readNumber(raw.samplesPerPixel, 'settings.samplesPerPixel', { min: 1, integer: true }),
        maxDepth: readNumber(raw.maxDepth, 'settings.maxDepth', { min: 0, integer: true }),
    };
    if (raw.seed !== undefined) {
        settings.seed = readNumber(raw.seed, 'settings.seed', { integer: true });
    }
    return settings;
}

function parseCamera(value: unknown): RawCamera {
    const raw = readRecord(value, 'camera');
    const camera: RawCamera = {
        origin: readVec3(raw.origin, 'camera.origin'),
        viewportHeight: readNumber(raw.viewportHeight, 'camera.viewportHeight', { min: Number.MIN_VALUE }),
        focalLength: readNumber(raw.focalLength, 'camera.focalLength', { min: Number.MIN_VALUE }),
    };
    if (raw.lookAt !== undefined) {
        camera.lookAt = readVec3(raw.lookAt, 'camera.lookAt');
        camera.up = raw.up === undefined ? [0, 1, 0] : readVec3(raw.up, 'camera.up');
    }
    return camera;
}

function parseMaterial(value: unknown, path: string): RawMaterial {
    const raw = readRecord(value, path);
    switch (raw.type) {
        case 'lambertian':
            return {
                type: 'lambertian',
                albedo: readVec3(raw.albedo, `${path}.albedo`, { min: 0, max: 1 }),
            };
        case 'metal':
            return {
                type: 'metal',
                albedo: readVec3(raw.albedo, `${path}.albedo`, { min: 0, max: 1 }),
                fuzz: readNumber(raw.fuzz ?? 0, `${path}.fuzz`, { min: 0, max: 1 }),
            };
        case 'dielectric':
            return {
                type: 'dielectric',
                refractionIndex: readNumber(raw.refractionIndex, `${path}.refractionIndex`, { min: Number.MIN_VALUE }),
            };
        default:
            throw new SceneFormatError(`${path}.type`, `unknown material type '${String(raw.type)}'`);
    }
}

function parseSphere(value: unknown, path: string, materials: Record<string, RawMaterial>): RawSphere {
    const raw = readRecord(value, path);
    if (typeof raw.material !== 'string' || !Object.hasOwn(materials, raw.material)) {
        throw new SceneFormatError(`${path}.material`, `unknown material '${String(raw.material)}'`);
    }
    return {
        center: readVec3(raw.center, `${path}.center`),
        radius: readNumber(raw.radius, `${path}.radius`, { min: Number.MIN_VALUE }),
        material: raw.material,
    };
}

// Validates a decoded scene file
export function parseScene(value: unknown): RawScene {
    const raw = readRecord(value, 'scene');

    // fromEntries defines own keys, so names like '__proto__' are kept as data
    const materials: Record<string, RawMaterial> = Object.fromEntries(
        Object.entries(readRecord(raw.materials, 'materials')).map(
            ([name, material]): [string, RawMaterial] => [name, parseMaterial(material, `materials.${name}`)]
        )
    );

    if (!Array.isArray(raw.spheres)) {
        throw new SceneFormatError('spheres', 'expected an array');
    }
    const spheres = raw.spheres.map((sphere: unknown, i: number) =>
        parseSphere(sphere, `spheres[${i}]`, materials)
    );

    return {
        settings: parseSettings(raw.settings),
        camera: parseCamera(raw.camera),
        materials,
        spheres,
    };
}

export async function loadScene(scenePath: string): Promise<RawScene> {
    let text: string;
    try {
        text = await readFile(scenePath, 'utf8');
    } catch (error) {
        throw new RethrownError(`Failed to read scene file '${scenePath}'`, error);
    }

    let decoded: unknown;
    try {
        decoded = JSON.parse(text);
    } catch (error) {
        throw new RethrownError(`Scene file '${scenePath}' is not valid JSON`, error);
    }

    const scene = parseScene(decoded);
    console.log(
        `Loaded ${scenePath}: ${scene.spheres.length} spheres, ${Object.keys(scene.materials).length} materials`
    );
    return scene;
}

function createMaterial(raw: RawMaterial): Material {
    switch (raw.type) {
        case 'lambertian':
            return new Lambertian(raw.albedo);
        case 'metal':
            return new Metal(raw.albedo, raw.fuzz);
        case 'dielectric':
            return new Dielectric(raw.refractionIndex);
    }
}

export interface SceneSetup {
    scene: Scene;
    camera: Camera;
    settings: RenderSettings;
    random: Random;
}

// Turns a scene description into the objects the renderer works with
export function buildScene(raw: RawScene): SceneSetup {
    const { aspectRatio, imageHeight, samplesPerPixel, maxDepth, seed } = raw.settings;

    // One instance per named material, shared by every sphere using it
    const materials = new Map<string, Material>();
    for (const [name, material] of Object.entries(raw.materials)) {
        materials.set(name, createMaterial(material));
    }

    const scene = new Scene();
    for (const sphere of raw.spheres) {
        const material = materials.get(sphere.material);
        if (!material) {
            throw new Error(`Unknown material '${sphere.material}'`);
        }
        scene.add(new Sphere(sphere.center, sphere.radius, material));
    }

    const { origin, viewportHeight, focalLength, lookAt, up } = raw.camera;
    const camera = new Camera(
        origin,
        viewportHeight,
        viewportHeight * aspectRatio,
        focalLength,
        lookAt ? { lookAt, up: up ?? [0, 1, 0] } : undefined
    );

    return {
        scene,
        camera,
        settings: {
            imageWidth: Math.trunc(imageHeight * aspectRatio),
            imageHeight,
            samplesPerPixel,
            maxDepth,
        },
        random: seed === undefined ? Math.random : seededRandom(seed),
    };
}

export async function writeImage(outputPath: string, image: Image): Promise<void> {
    try {
        await writeFile(outputPath, image.toPPM());
    } catch (error) {
        throw new RethrownError(`Failed to write image to '${outputPath}'`, error);
    }
    console.log(`Wrote ${image.width}x${image.height} image to ${outputPath}`);
}

// Formats large numbers into a more readable string with suffixes (K, M, B)
export function formatNumber(num: number) {
    const formatter = new Intl.NumberFormat('en-US', {
        notation: 'compact',
        compactDisplay: 'short', // 'short' for K, M, B; 'long' for thousand, million, billion
        maximumFractionDigits: 2,
    });
    return formatter.format(num);
}
