import { randomUnitVector, reflect, reflectance, refract } from './math.js';
import {
    type HitRecord,
    type Material,
    type Random,
    type Ray,
    type ScatterResult,
    Vec3,
} from './types.js';

function checkAlbedo(albedo: Vec3): Vec3 {
    for (const c of albedo) {
        if (!(c >= 0 && c <= 1)) {
            throw new Error(
                `Albedo components must be within [0, 1], got [${albedo.join(', ')}]`
            );
        }
    }
    return albedo;
}

export class Lambertian implements Material {
    readonly albedo: Vec3;

    constructor(albedo: Vec3) {
        this.albedo = checkAlbedo(albedo);
    }

    scatter(_ray: Ray, hit: HitRecord, random: Random): ScatterResult {
        let direction = Vec3.add(hit.normal, randomUnitVector(random));

        // The random vector can cancel the normal out
        if (Vec3.nearZero(direction)) {
            direction = hit.normal;
        }

        return {
            attenuation: this.albedo,
            scattered: { origin: hit.point, direction },
        };
    }
}

export class Metal implements Material {
    readonly albedo: Vec3;
    readonly fuzz: number;

    constructor(albedo: Vec3, fuzz: number) {
        if (Number.isNaN(fuzz)) {
            throw new Error('Metal fuzz must be a number, got NaN');
        }
        this.albedo = checkAlbedo(albedo);
        this.fuzz = Math.max(0, Math.min(1, fuzz));
    }

    scatter(ray: Ray, hit: HitRecord, random: Random): ScatterResult | null {
        const reflected = reflect(Vec3.normalize(ray.direction), hit.normal);
        const direction = Vec3.add(
            reflected,
            Vec3.scale(randomUnitVector(random), this.fuzz)
        );

        // Fuzzed below the surface: absorbed
        if (Vec3.dot(direction, hit.normal) <= 0) {
            return null;
        }

        return {
            attenuation: this.albedo,
            scattered: { origin: hit.point, direction },
        };
    }
}

export class Dielectric implements Material {
    readonly refractionIndex: number;

    constructor(refractionIndex: number) {
        if (!Number.isFinite(refractionIndex) || refractionIndex <= 0) {
            throw new Error(
                `Refraction index must be a positive number, got ${refractionIndex}`
            );
        }
        this.refractionIndex = refractionIndex;
    }

    scatter(ray: Ray, hit: HitRecord, random: Random): ScatterResult {
        const refractionRatio = hit.frontFace
            ? 1.0 / this.refractionIndex
            : this.refractionIndex;

        const unitDirection = Vec3.normalize(ray.direction);
        const cosTheta = Math.min(
            Vec3.dot(Vec3.negate(unitDirection), hit.normal),
            1.0
        );
        const sinTheta = Math.sqrt(1.0 - cosTheta * cosTheta);

        const cannotRefract = refractionRatio * sinTheta > 1.0;
        const direction =
            cannotRefract || reflectance(cosTheta, refractionRatio) > random()
                ? reflect(unitDirection, hit.normal)
                : refract(unitDirection, hit.normal, refractionRatio);

        return {
            attenuation: [1, 1, 1],
            scattered: { origin: hit.point, direction },
        };
    }
}
