import { type Random, Vec3 } from './types.js';

// Linear congruential generator, deterministic for a given seed
export function seededRandom(seed: number): Random {
    let state = Math.trunc(seed) & 0x7fffffff;
    return () => {
        state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
        return state / 0x80000000;
    };
}

export function randomRange(random: Random, min: number, max: number): number {
    return min + (max - min) * random();
}

export function randomInUnitSphere(random: Random): Vec3 {
    for (;;) {
        const p: Vec3 = [
            randomRange(random, -1, 1),
            randomRange(random, -1, 1),
            randomRange(random, -1, 1),
        ];
        const lengthSquared = Vec3.lengthSquared(p);
        if (lengthSquared < 1 && lengthSquared > 1e-160) {
            return p;
        }
    }
}

export function randomUnitVector(random: Random): Vec3 {
    return Vec3.normalize(randomInUnitSphere(random));
}

// Mirror v about the plane with normal n (n must be unit length)
export function reflect(v: Vec3, n: Vec3): Vec3 {
    return Vec3.subtract(v, Vec3.scale(n, 2 * Vec3.dot(v, n)));
}

// Snell's law for a unit incident direction
export function refract(uv: Vec3, n: Vec3, etaiOverEtat: number): Vec3 {
    const cosTheta = Math.min(Vec3.dot(Vec3.negate(uv), n), 1.0);
    const rOutPerp = Vec3.scale(
        Vec3.add(uv, Vec3.scale(n, cosTheta)),
        etaiOverEtat
    );
    const rOutParallel = Vec3.scale(
        n,
        -Math.sqrt(Math.abs(1.0 - Vec3.lengthSquared(rOutPerp)))
    );
    return Vec3.add(rOutPerp, rOutParallel);
}

// Schlick's approximation of Fresnel reflectance
export function reflectance(cosine: number, refractionRatio: number): number {
    let r0 = (1 - refractionRatio) / (1 + refractionRatio);
    r0 = r0 * r0;
    return r0 + (1 - r0) * Math.pow(1 - cosine, 5);
}
