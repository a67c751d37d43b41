import { z } from 'zod';

export const depsJsonSchema = z
  .object({
    /** Source roots, relative to the project directory. */
    paths: z.array(z.string()).optional(),
    /** Dependency coordinates; merged key-wise across layers. */
    deps: z.record(z.unknown()).optional(),
    aliases: z.record(z.unknown()).optional(),
    /** TypeScript compiler options used when emitting units. */
    compilerOptions: z.record(z.unknown()).optional(),
  })
  .passthrough();

/** One `deps.json` layer (install, user or project). */
export type DepsJson = z.infer<typeof depsJsonSchema>;

/** Result of merging the three layers. Immutable once built. */
export type EffectiveConfig = Readonly<DepsJson>;

export type DescriptorLayer = 'install' | 'user' | 'project';

export type DescriptorLocations = Record<DescriptorLayer, string>;

export type DescriptorSet = Record<DescriptorLayer, DepsJson | null>;
