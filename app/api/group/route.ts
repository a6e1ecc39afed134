import { NextRequest } from "next/server";
import { badRequest, conflict, created, parseJson, serverError } from "@/lib/api";
import { hashPin } from "@/lib/auth";
import { loadDrawConfig } from "@/lib/config";
import { createGroup } from "@/lib/repository";
import { createGroupSchema } from "@/lib/schemas";
import { isDuplicateSlugError, slugify, suffixSlug } from "@/lib/slug";

export async function POST(request: NextRequest) {
  const parsed = await parseJson(request, createGroupSchema);
  if (!parsed.ok) {
    return parsed.response;
  }

  try {
    const config = loadDrawConfig();
    const pinHash = await hashPin(parsed.data.pin);
    const baseSlugInput = parsed.data.slug?.trim() || parsed.data.name;
    const baseSlug = slugify(baseSlugInput);
    if (baseSlug.length < 2) {
      return badRequest("Could not generate a valid slug");
    }

    for (let attempt = 0; attempt < 50; attempt += 1) {
      const candidateSlug = suffixSlug(baseSlug, attempt);
      try {
        const group = await createGroup({
          name: parsed.data.name,
          slug: candidateSlug,
          pinHash,
          description: parsed.data.description?.trim() || null,
          priceLimit: parsed.data.priceLimit?.trim() || config.defaultPriceLimit,
          maxParticipants: parsed.data.maxParticipants ?? config.maxParticipants
        });

        return created({
          group,
          groupUrl: `/api/group/${group.slug}`
        });
      } catch (error) {
        if (isDuplicateSlugError(error)) {
          continue;
        }

        throw error;
      }
    }

    return conflict("Could not allocate a unique slug");
  } catch (error) {
    if (isDuplicateSlugError(error)) {
      return conflict("Group slug already exists");
    }

    console.error("[group] unhandled error:", error);
    return serverError();
  }
}
