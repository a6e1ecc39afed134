import { z } from "zod";

export const createGroupSchema = z.object({
  name: z.string().min(2).max(80),
  slug: z
    .string()
    .min(2)
    .max(80)
    .regex(/^[a-z0-9-]+$/)
    .optional(),
  pin: z.string().min(4).max(32),
  description: z.string().max(1000).optional(),
  priceLimit: z.string().min(1).max(100).optional(),
  maxParticipants: z.number().int().min(2).max(1000).optional()
});

export const unlockSchema = z.object({
  pin: z.string().min(4).max(32)
});

export const changePinSchema = z
  .object({
    currentPin: z.string().min(4).max(32),
    newPin: z.string().min(4).max(32)
  })
  .refine((value) => value.currentPin !== value.newPin, {
    message: "New PIN must differ from the current PIN",
    path: ["newPin"]
  });

export const participantsMutationSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("add"),
    name: z.string().trim().min(1).max(200),
    wishlist: z.string().max(2000).optional()
  }),
  z.object({
    action: z.literal("update"),
    participantId: z.string().uuid(),
    name: z.string().trim().min(1).max(200).optional(),
    wishlist: z.string().max(2000).optional()
  }),
  z.object({
    action: z.literal("remove"),
    participantId: z.string().uuid()
  })
]);

export const exclusionsMutationSchema = z
  .discriminatedUnion("action", [
    z.object({
      action: z.literal("add"),
      giverId: z.string().uuid(),
      receiverId: z.string().uuid(),
      kind: z.enum(["mutual", "directional"]).default("mutual"),
      reason: z.string().max(500).optional()
    }),
    z.object({
      action: z.literal("remove"),
      exclusionId: z.string().uuid()
    })
  ])
  .superRefine((value, ctx) => {
    if (value.action === "add" && value.giverId === value.receiverId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "A participant cannot be excluded from themselves",
        path: ["receiverId"]
      });
    }
  });

export const drawSchema = z.object({
  seed: z.union([z.number().int().safe(), z.string().min(1).max(128)]).optional()
});

export const giftProgressSchema = z.object({
  giverId: z.string().uuid(),
  step: z.enum(["sent", "delivered", "confirmed"]),
  done: z.boolean().default(true)
});
