/**
 * Request schemas.
 *
 * Schemas check shape and encoding only. Business rules (empty names,
 * capacity, fee sufficiency) belong to the registries, so their errors
 * reach the client with the domain code.
 */

import { z } from "zod";
import type { Address, EventRef, Hex } from "@proofpass/types";
import { isAddress, isEventRef, isHex } from "@proofpass/types";

// =============================================================================
// Primitives
// =============================================================================

export const AddressSchema = z.custom<Address>((value) => isAddress(value), {
  message: "Expected a 20-byte hex address",
});

export const EventRefSchema = z.custom<EventRef>((value) => isEventRef(value), {
  message: "Expected a 32-byte hex reference",
});

export const HexSchema = z.custom<Hex>((value) => isHex(value), {
  message: "Expected a 0x-prefixed hex string",
});

/** Amounts travel as decimal strings of wei. */
export const WeiSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer amount in wei")
  .transform((value) => BigInt(value));

export const TokenIdParamSchema = z.coerce.number().int().min(0);

// =============================================================================
// Events
// =============================================================================

export const CreateEventSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  imageRef: z.string(),
  maxAttendees: z.number().default(0),
});

export const UpdateEventSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  imageRef: z.string(),
});

export const EventStatusSchema = z.object({
  active: z.boolean(),
});

export type CreateEventDto = z.infer<typeof CreateEventSchema>;
export type UpdateEventDto = z.infer<typeof UpdateEventSchema>;

// =============================================================================
// Tokens
// =============================================================================

export const MintSchema = z.object({
  recipient: AddressSchema,
  metadataURI: z.string(),
  eventRef: EventRefSchema,
  proof: HexSchema.optional(),
});

export const PairSchema = z.object({
  attendanceTokenId: z.number().int().min(0),
  organizer: AddressSchema,
  eventRef: EventRefSchema,
  payment: WeiSchema,
});

export type MintDto = z.infer<typeof MintSchema>;
export type PairDto = z.infer<typeof PairSchema>;

// =============================================================================
// Funds
// =============================================================================

export const FaucetSchema = z.object({
  address: AddressSchema,
  amount: WeiSchema,
});

// =============================================================================
// Queries
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const StreamQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type PaginationQueryDto = z.infer<typeof PaginationQuerySchema>;
export type StreamQuery = z.infer<typeof StreamQuerySchema>;
