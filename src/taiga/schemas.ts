import { type Static, type TSchema, Type } from "@sinclair/typebox";

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Union([schema, Type.Null()]);

export const TaigaUserSchema = Type.Object({
  id: Type.Number(),
  username: Type.String(),
  full_name: Type.Optional(Nullable(Type.String())),
  email: Type.Optional(Nullable(Type.String())),
});

export const TaigaAuthSchema = Type.Object({
  auth_token: Type.String({ minLength: 1 }),
  refresh: Type.Optional(Type.String()),
});

export const TaigaProjectSchema = Type.Object({
  id: Type.Number(),
  name: Type.String(),
  slug: Type.String(),
  is_private: Type.Optional(Type.Boolean()),
  is_kanban_activated: Type.Optional(Type.Boolean()),
  my_permissions: Type.Optional(Type.Array(Type.String())),
});

export const TaigaStatusSchema = Type.Object({
  id: Type.Number(),
  name: Type.String(),
  is_closed: Type.Optional(Type.Boolean()),
  order: Type.Optional(Type.Number()),
});

export const TaigaStatusListSchema = Type.Array(TaigaStatusSchema);

export const TaigaPageSchema = Type.Array(Type.Unknown());

/**
 * Only the fields the flow diagram needs. `created_date` and `status` may be
 * missing or null; such stories are skipped later, not rejected here.
 */
export const TaigaStorySchema = Type.Object({
  id: Type.Number(),
  ref: Type.Optional(Type.Number()),
  created_date: Type.Optional(Nullable(Type.String())),
  status: Type.Optional(Nullable(Type.Number())),
});

export type TaigaUser = Static<typeof TaigaUserSchema>;
export type TaigaAuth = Static<typeof TaigaAuthSchema>;
export type TaigaProject = Static<typeof TaigaProjectSchema>;
export type TaigaStatus = Static<typeof TaigaStatusSchema>;
export type TaigaStory = Static<typeof TaigaStorySchema>;
