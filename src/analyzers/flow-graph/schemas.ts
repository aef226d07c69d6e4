/**
 * Zod schemas for exported agent documents
 *
 * Only the fields the analysis reads are declared; anything else in a
 * document passes through untouched.
 */

import { z } from 'zod';

export const FulfillmentSchema = z
  .object({
    messages: z.array(z.unknown()).optional(),
    webhook: z.string().optional(),
  })
  .passthrough();

export const TransitionRouteSchema = z
  .object({
    condition: z.string().optional(),
    intent: z.string().optional(),
    targetPage: z.string().optional(),
    targetFlow: z.string().optional(),
    triggerFulfillment: FulfillmentSchema.optional(),
  })
  .passthrough();

export const EventHandlerSchema = z
  .object({
    event: z.string().default(''),
    targetPage: z.string().optional(),
    targetFlow: z.string().optional(),
    triggerFulfillment: FulfillmentSchema.optional(),
  })
  .passthrough();

export const FormParameterSchema = z
  .object({
    displayName: z.string().optional(),
    fillBehavior: z
      .object({
        initialPromptFulfillment: FulfillmentSchema.optional(),
        repromptEventHandlers: z.array(EventHandlerSchema).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const FlowDocumentSchema = z
  .object({
    name: z.string().optional(),
    displayName: z.string().optional(),
    transitionRoutes: z.array(TransitionRouteSchema).default([]),
    eventHandlers: z.array(EventHandlerSchema).default([]),
    transitionRouteGroups: z.array(z.string()).default([]),
  })
  .passthrough();

export const PageDocumentSchema = z
  .object({
    name: z.string().optional(),
    displayName: z.string().optional(),
    entryFulfillment: FulfillmentSchema.optional(),
    form: z
      .object({
        parameters: z.array(FormParameterSchema).default([]),
      })
      .passthrough()
      .optional(),
    transitionRoutes: z.array(TransitionRouteSchema).default([]),
    eventHandlers: z.array(EventHandlerSchema).default([]),
    transitionRouteGroups: z.array(z.string()).default([]),
  })
  .passthrough();

export const RouteGroupDocumentSchema = z
  .object({
    name: z.string().optional(),
    displayName: z.string().optional(),
    transitionRoutes: z.array(TransitionRouteSchema).default([]),
  })
  .passthrough();

export type FulfillmentDocument = z.infer<typeof FulfillmentSchema>;
export type TransitionRouteDocument = z.infer<typeof TransitionRouteSchema>;
export type EventHandlerDocument = z.infer<typeof EventHandlerSchema>;
export type FlowDocument = z.infer<typeof FlowDocumentSchema>;
export type PageDocument = z.infer<typeof PageDocumentSchema>;
export type RouteGroupDocument = z.infer<typeof RouteGroupDocumentSchema>;
