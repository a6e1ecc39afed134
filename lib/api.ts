import { NextRequest, NextResponse } from "next/server";
import { ZodError, type ZodTypeAny, type output } from "zod";
import {
  getBearerToken,
  organizerAccessProblem,
  verifyOrganizerToken,
  type OrganizerClaims
} from "@/lib/auth";
import {
  AssignmentError,
  ConcurrentModificationError,
  GroupStateError,
  InfeasibleConstraintsError,
  InternalAssignmentError
} from "@/lib/errors";
import type { Group } from "@/lib/types";

export async function parseJson<S extends ZodTypeAny>(request: NextRequest, schema: S) {
  try {
    const payload: unknown = await request.json();
    const data: output<S> = schema.parse(payload);
    return { ok: true as const, data };
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        ok: false as const,
        response: badRequest("Invalid request body", error.flatten())
      };
    }

    return { ok: false as const, response: badRequest("Invalid JSON") };
  }
}

export async function requireOrganizer(
  request: NextRequest,
  group: Pick<Group, "id" | "organizer_version">
) {
  const token = getBearerToken(request.headers.get("authorization"));
  if (!token) {
    return { ok: false as const, response: unauthorized("Missing organizer token") };
  }

  let claims: OrganizerClaims;
  try {
    claims = await verifyOrganizerToken(token);
  } catch {
    return { ok: false as const, response: unauthorized("Invalid organizer token") };
  }

  const problem = organizerAccessProblem(claims, group);
  if (problem) {
    return { ok: false as const, response: forbidden(problem) };
  }

  return { ok: true as const };
}

/**
 * Maps engine and lifecycle errors to responses. Returns null for anything
 * else so the caller can log it and fall through to a 500.
 */
export function domainErrorResponse(error: unknown) {
  if (error instanceof GroupStateError || error instanceof ConcurrentModificationError) {
    return conflict(error.message);
  }

  if (error instanceof InternalAssignmentError) {
    console.error("[draw] engine invariant violated:", error);
    return serverError(error.message);
  }

  if (error instanceof AssignmentError) {
    const details =
      error instanceof InfeasibleConstraintsError
        ? { giverIds: error.giverIds, receiverIds: error.receiverIds }
        : undefined;

    return NextResponse.json(
      { error: error.message, code: error.code, details },
      { status: 400 }
    );
  }

  return null;
}

export function ok(data: unknown) {
  return NextResponse.json(data, { status: 200 });
}

export function created(data: unknown) {
  return NextResponse.json(data, { status: 201 });
}

export function badRequest(message: string, details?: unknown) {
  return NextResponse.json({ error: message, details }, { status: 400 });
}

export function unauthorized(message = "Unauthorized") {
  return NextResponse.json({ error: message }, { status: 401 });
}

export function forbidden(message = "Forbidden") {
  return NextResponse.json({ error: message }, { status: 403 });
}

export function notFound(message = "Not found") {
  return NextResponse.json({ error: message }, { status: 404 });
}

export function tooManyRequests(message: string, retryAfterSeconds: number) {
  return NextResponse.json(
    { error: message },
    { status: 429, headers: { "Retry-After": String(retryAfterSeconds) } }
  );
}

export function conflict(message: string) {
  return NextResponse.json({ error: message }, { status: 409 });
}

export function serverError(message = "Internal server error") {
  return NextResponse.json({ error: message }, { status: 500 });
}
