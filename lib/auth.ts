import bcrypt from "bcryptjs";
import { SignJWT, jwtVerify } from "jose";
import { z } from "zod";
import type { Group } from "@/lib/types";

const issuer = "secret-santa-draw";
const audience = "group-organizer";

const organizerClaimsSchema = z.object({
  group_id: z.string().min(1),
  role: z.literal("organizer"),
  ver: z.number().int().positive()
});

export interface OrganizerClaims {
  groupId: string;
  version: number;
}

function getSecret() {
  const secretValue = process.env.JWT_SECRET;
  if (!secretValue) {
    throw new Error("JWT_SECRET is required");
  }

  return new TextEncoder().encode(secretValue);
}

export async function hashPin(pin: string) {
  return bcrypt.hash(pin, 12);
}

export async function verifyPin(pin: string, hash: string) {
  return bcrypt.compare(pin, hash);
}

export async function signOrganizerToken({
  group,
  ttlSeconds = 60 * 60 * 24 * 7
}: {
  group: Pick<Group, "id" | "organizer_version">;
  ttlSeconds?: number;
}) {
  const exp = Math.floor(Date.now() / 1000) + ttlSeconds;

  const token = await new SignJWT({
    group_id: group.id,
    role: "organizer",
    ver: group.organizer_version
  })
    .setProtectedHeader({ alg: "HS256" })
    .setIssuer(issuer)
    .setAudience(audience)
    .setIssuedAt()
    .setExpirationTime(exp)
    .sign(getSecret());

  return {
    token,
    expiresAt: new Date(exp * 1000).toISOString()
  };
}

export async function verifyOrganizerToken(token: string): Promise<OrganizerClaims> {
  const { payload } = await jwtVerify(token, getSecret(), { issuer, audience });

  const claims = organizerClaimsSchema.safeParse(payload);
  if (!claims.success) {
    throw new Error("Invalid token claims");
  }

  return { groupId: claims.data.group_id, version: claims.data.ver };
}

/**
 * Returns why the claims do not grant access to `group`, or null when they do.
 * Tokens signed before the last PIN change carry an older version.
 */
export function organizerAccessProblem(
  claims: OrganizerClaims,
  group: Pick<Group, "id" | "organizer_version">
) {
  if (claims.groupId !== group.id) {
    return "Token group mismatch";
  }

  if (claims.version !== group.organizer_version) {
    return "Organizer token was revoked";
  }

  return null;
}

export function getBearerToken(header: string | null) {
  if (!header) {
    return null;
  }

  const [scheme, token] = header.split(" ");
  if (scheme !== "Bearer" || !token) {
    return null;
  }

  return token;
}
