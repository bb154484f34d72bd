// Zod provides runtime validation for request payloads.
import { z } from 'zod';

// Zod schemas validate incoming REST payloads and provide inferred TS types.
export const CustomerSchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().email(),
  phone: z.string().default(''),
  address: z.string().trim().min(1),
});

export const MAX_ITEM_QUANTITY = 1000;

export const OrderItemSchema = z.object({
  productId: z.number().int().positive().safe(),
  quantity: z.number().int().positive().max(MAX_ITEM_QUANTITY),
});

// Emptiness of items is checked by the order service so direct callers get the same answer.
export const CreateOrderSchema = z.object({
  customer: CustomerSchema,
  items: z.array(OrderItemSchema),
});

// Image is a URL, a data URI, or a short symbol; uploads are handled elsewhere.
export const CreateProductSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
  price: z.number().positive(),
  image: z.string().min(1).optional(),
  category: z.string().trim().min(1),
});

export const UpdateProductSchema = CreateProductSchema.partial()
  .extend({ description: z.string().optional() })
  .refine(patch => Object.values(patch).some(v => v !== undefined), {
    message: 'At least one field must be provided',
  });

export const LoginSchema = z.object({
  username: z.string(),
  password: z.string(),
});

// Inferred input types used in service layer.
export type CreateOrderInput = z.infer<typeof CreateOrderSchema>;
export type CreateProductInput = z.infer<typeof CreateProductSchema>;
export type UpdateProductInput = z.infer<typeof UpdateProductSchema>;
