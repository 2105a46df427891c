import * as THREE from 'three';
import { warn } from './debug';
import type { PropertyAccessor } from './types';

/**
 * Walk a dotted property path (`'position.x'`) down to the object owning the
 * last segment. Returns null when an intermediate segment is not an object.
 */
function resolveOwner(target: object, property: string): { owner: object; key: string } | null {
  const segments = property.split('.');
  let owner: object = target;
  for (let i = 0; i < segments.length - 1; i++) {
    const next: unknown = Reflect.get(owner, segments[i]);
    if (typeof next !== 'object' || next === null) {
      return null;
    }
    owner = next;
  }
  return { owner, key: segments[segments.length - 1] };
}

function readField(target: object, property: string): unknown {
  const resolved = resolveOwner(target, property);
  return resolved ? Reflect.get(resolved.owner, resolved.key) : undefined;
}

function writeField(target: object, property: string, value: unknown): void {
  const resolved = resolveOwner(target, property);
  if (!resolved) {
    warn('PropertyAccessor', `cannot resolve "${property}"`);
    return;
  }
  Reflect.set(resolved.owner, resolved.key, value);
}

/**
 * Plain numeric fields, e.g. `opacity` or `position.x`.
 */
export const numberAccessor: PropertyAccessor<number> = {
  get(target, property) {
    const value = readField(target, property);
    if (typeof value !== 'number') {
      warn('PropertyAccessor', `"${property}" is not a number, reading it as 0`);
      return 0;
    }
    return value;
  },
  set(target, property, value) {
    writeField(target, property, value);
  }
};

/**
 * `THREE.Vector3` fields. Existing vectors are updated in place, since
 * properties like `Object3D.position` are read-only references.
 */
export const vector3Accessor: PropertyAccessor<THREE.Vector3> = {
  get(target, property) {
    const value = readField(target, property);
    if (!(value instanceof THREE.Vector3)) {
      warn('PropertyAccessor', `"${property}" is not a Vector3, reading it as the origin`);
      return new THREE.Vector3();
    }
    return value.clone();
  },
  set(target, property, value) {
    const current = readField(target, property);
    if (current instanceof THREE.Vector3) {
      current.copy(value);
    } else {
      writeField(target, property, value.clone());
    }
  }
};

/**
 * `THREE.Color` fields, updated in place like vectors (`material.color`).
 */
export const colorAccessor: PropertyAccessor<THREE.Color> = {
  get(target, property) {
    const value = readField(target, property);
    if (!(value instanceof THREE.Color)) {
      warn('PropertyAccessor', `"${property}" is not a Color, reading it as black`);
      return new THREE.Color(0, 0, 0);
    }
    return value.clone();
  },
  set(target, property, value) {
    const current = readField(target, property);
    if (current instanceof THREE.Color) {
      current.copy(value);
    } else {
      writeField(target, property, value.clone());
    }
  }
};

/**
 * Accessor built from closures, for targets whose state is not a plain field.
 */
export function accessor<V>(
  get: (target: object, property: string) => V,
  set: (target: object, property: string, value: V) => void
): PropertyAccessor<V> {
  return { get, set };
}
