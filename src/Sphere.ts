import { type HitRecord, type Hittable, type Material, Ray, Vec3 } from './types.js';

export class Sphere implements Hittable {
    readonly center: Vec3;
    readonly radius: number;
    readonly material: Material;

    constructor(center: Vec3, radius: number, material: Material) {
        if (!Number.isFinite(radius) || radius <= 0) {
            throw new Error(`Sphere radius must be positive, got ${radius}`);
        }
        this.center = center;
        this.radius = radius;
        this.material = material;
    }

    hit(ray: Ray, tMin: number, tMax: number): HitRecord | null {
        const oc = Vec3.subtract(ray.origin, this.center);
        const a = Vec3.lengthSquared(ray.direction);
        const halfB = Vec3.dot(oc, ray.direction);
        const c = Vec3.lengthSquared(oc) - this.radius * this.radius;

        const discriminant = halfB * halfB - a * c;
        if (discriminant < 0) {
            return null;
        }
        const sqrtd = Math.sqrt(discriminant);

        // Nearest root inside the open interval (tMin, tMax)
        let root = (-halfB - sqrtd) / a;
        if (root <= tMin || root >= tMax) {
            root = (-halfB + sqrtd) / a;
            if (root <= tMin || root >= tMax) {
                return null;
            }
        }

        const point = Ray.at(ray, root);
        const outwardNormal = Vec3.divide(
            Vec3.subtract(point, this.center),
            this.radius
        );
        const frontFace = Vec3.dot(ray.direction, outwardNormal) < 0;

        return {
            point,
            normal: frontFace ? outwardNormal : Vec3.negate(outwardNormal),
            t: root,
            frontFace,
            material: this.material,
        };
    }
}
