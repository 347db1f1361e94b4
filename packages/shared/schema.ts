import { z } from "zod";
import {
  AREA_UNITS,
  COORDINATE_FORMATS,
  DEFAULT_CAESAR_SHIFT,
  DISTANCE_UNITS
} from "@utils";

// Coordinates travel as text in any notation parseCoordinate understands.
export const coordinateTextSchema = z.string().trim().min(1);

export const coordinateFormatSchema = z.enum(COORDINATE_FORMATS);
export const distanceUnitSchema = z.enum(DISTANCE_UNITS);
export const areaUnitSchema = z.enum(AREA_UNITS);

// ============================================================================
// CIPHER
// ============================================================================

export const cipherRequestSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("caesar"),
    text: z.string(),
    shift: z.number().int().default(DEFAULT_CAESAR_SHIFT),
    encode: z.boolean().default(false),
  }),
  z.object({
    mode: z.literal("vigenere"),
    text: z.string(),
    key: z.string().min(1),
    encode: z.boolean().default(false),
  }),
  z.object({
    mode: z.literal("atbash"),
    text: z.string(),
  }),
  z.object({
    mode: z.literal("morse"),
    text: z.string(),
    encode: z.boolean().default(false),
  }),
  z.object({
    mode: z.literal("frequency"),
    text: z.string(),
  }),
  z.object({
    mode: z.literal("substitution"),
    text: z.string(),
    mappings: z.record(z.string()).default({}),
  }),
]);

export type CipherRequest = z.infer<typeof cipherRequestSchema>;

// ============================================================================
// COORDS
// ============================================================================

export const coordsRequestSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("convert"),
    coordinate: coordinateTextSchema,
    format: coordinateFormatSchema.default("decimal"),
  }),
  z.object({
    mode: z.literal("distance"),
    from: coordinateTextSchema,
    to: coordinateTextSchema,
    unit: distanceUnitSchema.default("km"),
  }),
  z.object({
    mode: z.literal("bearing"),
    from: coordinateTextSchema,
    to: coordinateTextSchema,
  }),
  z.object({
    mode: z.literal("project"),
    origin: coordinateTextSchema,
    distance: z.number(),
    bearing: z.number(),
    unit: distanceUnitSchema.default("km"),
    format: coordinateFormatSchema.default("decimal"),
  }),
]);

export type CoordsRequest = z.infer<typeof coordsRequestSchema>;

// ============================================================================
// GEOMETRY
// ============================================================================

const triangleSchema = z.array(coordinateTextSchema).length(3);

export const geometryRequestSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("circumcenter"),
    points: triangleSchema,
    radius: z.boolean().default(false),
    unit: distanceUnitSchema.default("km"),
    format: coordinateFormatSchema.default("decimal"),
  }),
  z.object({
    mode: z.literal("orthocenter"),
    points: triangleSchema,
    format: coordinateFormatSchema.default("decimal"),
  }),
  z.object({
    mode: z.literal("triangle-area"),
    points: triangleSchema,
    unit: areaUnitSchema.default("km²"),
  }),
  z.object({
    mode: z.literal("midpoint"),
    points: z.array(coordinateTextSchema).length(2),
    format: coordinateFormatSchema.default("decimal"),
  }),
  z.object({
    mode: z.literal("centroid"),
    points: z.array(coordinateTextSchema),
    format: coordinateFormatSchema.default("decimal"),
  }),
  z.object({
    mode: z.literal("bounding-box"),
    points: z.array(coordinateTextSchema),
    format: coordinateFormatSchema.default("decimal"),
  }),
  z.object({
    mode: z.literal("point-in-polygon"),
    point: coordinateTextSchema,
    polygon: z.array(coordinateTextSchema),
  }),
]);

export type GeometryRequest = z.infer<typeof geometryRequestSchema>;

// ============================================================================
// TOOLS
// ============================================================================

export const a1z26DirectionEnum = ["to-numbers", "to-letters"] as const;

export const toolsRequestSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("ascii-to-text"), input: z.string() }),
  z.object({ mode: z.literal("text-to-ascii"), input: z.string() }),
  z.object({ mode: z.literal("anagram"), input: z.string() }),
  z.object({ mode: z.literal("permutations"), input: z.string() }),
  z.object({
    mode: z.literal("a1z26"),
    input: z.string(),
    direction: z.enum(a1z26DirectionEnum),
    offset: z.number().int().default(0),
  }),
  z.object({
    mode: z.literal("reverse"),
    input: z.string(),
    wordsOnly: z.boolean().default(false),
  }),
  z.object({ mode: z.literal("extract-numbers"), input: z.string() }),
]);

export type ToolsRequest = z.infer<typeof toolsRequestSchema>;
