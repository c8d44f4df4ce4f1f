import { z } from 'zod';

/*
 * Payload schemas for the configuration objects the client touches.
 *
 * Only the fields the client itself reads are declared; everything else the
 * API returns (or the caller sends) passes through untouched.
 */

const named = z.object({ name: z.string().min(1) }).passthrough();
const indexed = z.object({ index: z.number().int().nonnegative().optional() }).passthrough();

export const BackendSchema = z.object({
    name: z.string().min(1),
    mode: z.enum(['http', 'tcp']).optional(),
    balance: z.object({ algorithm: z.string() }).passthrough().optional(),
}).passthrough();

export const ServerSchema = z.object({
    name: z.string().min(1),
    address: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
    check: z.enum(['enabled', 'disabled']).optional(),
    weight: z.number().int().nonnegative().optional(),
    maxconn: z.number().int().nonnegative().optional(),
}).passthrough();

export const FrontendSchema = z.object({
    name: z.string().min(1),
    default_backend: z.string().optional(),
    mode: z.enum(['http', 'tcp']).optional(),
    maxconn: z.number().int().nonnegative().optional(),
}).passthrough();

export const AclSchema = z.object({
    index: z.number().int().nonnegative().optional(),
    acl_name: z.string().min(1),
    criterion: z.string().min(1),
    value: z.string().optional(),
}).passthrough();

export const BindSchema = z.object({
    name: z.string().min(1),
    address: z.string().optional(),
    port: z.number().int().min(1).max(65535).optional(),
}).passthrough();

export const RuleSchema = indexed.extend({ type: z.string().min(1) });

export const TcpCheckSchema = indexed.extend({ action: z.string().min(1) });

export const HttpCheckSchema = indexed.extend({ type: z.string().min(1) });

export const NamedSchema = named;

export const AddressedSchema = named.extend({
    address: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
});

export const GlobalSchema = z.object({}).passthrough();

export type BackendPayload = z.infer<typeof BackendSchema>;
export type ServerPayload = z.infer<typeof ServerSchema>;
export type FrontendPayload = z.infer<typeof FrontendSchema>;
export type AclPayload = z.infer<typeof AclSchema>;
export type BindPayload = z.infer<typeof BindSchema>;
export type RulePayload = z.infer<typeof RuleSchema>;
export type TcpCheckPayload = z.infer<typeof TcpCheckSchema>;
export type HttpCheckPayload = z.infer<typeof HttpCheckSchema>;
export type NamedPayload = z.infer<typeof NamedSchema>;
export type AddressedPayload = z.infer<typeof AddressedSchema>;
export type GlobalPayload = z.infer<typeof GlobalSchema>;

/** Body of `POST /services/haproxy/transactions`. */
export const TransactionResponseSchema = z.object({
    id: z.string().min(1),
    _version: z.number().int().optional(),
    status: z.string().optional(),
}).passthrough();

export type TransactionResponse = z.infer<typeof TransactionResponseSchema>;

/** `GET .../configuration/version` answers a bare integer on some releases and `{version}` on others. */
export const ConfigurationVersionSchema = z.union([
    z.number().int(),
    z.string().regex(/^\d+$/),
    z.object({ version: z.union([z.number().int(), z.string().regex(/^\d+$/)]) }).passthrough(),
]);
