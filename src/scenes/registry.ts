/**
 * Named scene builders.
 */

import type { CameraConfigInput } from "../config";
import type { Hittable, Rng } from "../scene/types";

export interface BuiltScene {
  world: Hittable;
  camera: CameraConfigInput;
}

export interface SceneDef {
  name: string;
  description: string;
  build(rng: Rng): BuiltScene;
}

const scenes = new Map<string, SceneDef>();

export function registerScene(def: SceneDef): void {
  if (scenes.has(def.name)) {
    throw new Error(`Scene "${def.name}" is already registered`);
  }
  scenes.set(def.name, def);
}

export function getScene(name: string): SceneDef | undefined {
  return scenes.get(name);
}

export function listScenes(): SceneDef[] {
  return [...scenes.values()];
}
