import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import standardVariantJson from '../../variants/standard.json';
import { ConfigurationError } from './errors';

const coordSchema = z.tuple([z.number().int().min(0), z.number().int().min(0)]);

const tileSpecSchema = z.object({
  letter: z.string().regex(/^[A-Z]$/),
  count: z.number().int().min(0),
  value: z.number().int().min(0)
});

const premiumGroupSchema = z.object({
  kind: z.enum(['letter', 'word']),
  multiplier: z.number().int().min(1),
  squares: z.array(coordSchema)
});

export const variantSchema = z
  .object({
    name: z.string().min(1),
    size: z.number().int().min(3).max(26),
    rackSize: z.number().int().min(1),
    bingoBonus: z.number().int().min(0).default(50),
    firstMoveBonus: z.number().int().min(0).default(0),
    center: z.object({ x: z.number().int().min(0), y: z.number().int().min(0) }),
    blanks: z.number().int().min(0).default(0),
    tiles: z.array(tileSpecSchema).min(1),
    premiums: z.array(premiumGroupSchema).default([])
  })
  .superRefine((variant, ctx) => {
    const inside = (x: number, y: number) => x < variant.size && y < variant.size;
    if (!inside(variant.center.x, variant.center.y)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'center lies outside the board', path: ['center'] });
    }
    variant.premiums.forEach((group, i) => {
      group.squares.forEach(([x, y], j) => {
        if (!inside(x, y)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `square ${x},${y} lies outside the board`,
            path: ['premiums', i, 'squares', j]
          });
        }
      });
    });
    const letters = new Set<string>();
    variant.tiles.forEach((spec, i) => {
      if (letters.has(spec.letter)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate letter ${spec.letter}`, path: ['tiles', i] });
      }
      letters.add(spec.letter);
    });
  });

export type Variant = z.infer<typeof variantSchema>;
export type TileSpec = z.infer<typeof tileSpecSchema>;

export function parseVariant(data: unknown, source = 'variant'): Variant {
  const parsed = variantSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${details.join('; ')}`, parsed.error);
  }
  return parsed.data;
}

export const STANDARD_VARIANT: Variant = parseVariant(standardVariantJson, 'standard variant');

export async function loadVariant(path: string): Promise<Variant> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read variant file ${path}`, err);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Variant file ${path} is not valid JSON`, err);
  }
  return parseVariant(json, `variant file ${path}`);
}

export function letterValues(variant: Variant): Map<string, number> {
  return new Map(variant.tiles.map((spec) => [spec.letter, spec.value]));
}
