import { z } from 'zod';

// ============================================
// World Snapshot Schemas
// ============================================

// Leaves the id counter room to step past the highest restored id
const MAX_RESTORED_ID = Number.MAX_SAFE_INTEGER - 1;

const EntityIdSchema = z
  .number()
  .int()
  .positive({ error: 'Entity ids must be positive integers' })
  .max(MAX_RESTORED_ID, { error: 'Entity ids must stay below the largest safe integer' });

/** Component kind → field record */
const ComponentsSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export const EntitySnapshotSchema = z.object({
  id: EntityIdSchema,
  active: z.boolean().default(true),
  tags: z.array(z.string()).default([]),
  components: ComponentsSchema.default({}),
});

export const WorldSnapshotSchema = z
  .object({
    entities: z.array(EntitySnapshotSchema),
    nextEntityId: z
      .number()
      .int()
      .positive({ error: 'nextEntityId must be a positive integer' })
      .max(MAX_RESTORED_ID, { error: 'nextEntityId must stay below the largest safe integer' }),
    templates: z.record(z.string(), ComponentsSchema).default({}),
  })
  .superRefine((snapshot, ctx) => {
    const seen = new Set<number>();
    snapshot.entities.forEach((entity, index) => {
      if (seen.has(entity.id)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate entity id ${entity.id}`,
          path: ['entities', index, 'id'],
        });
      }
      seen.add(entity.id);
    });
  });

export type ParsedWorldSnapshot = z.output<typeof WorldSnapshotSchema>;
