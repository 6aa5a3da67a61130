import { artifactHashSchema } from "@mediasift/utils";
import type { ApiContext } from "../context.js";
import { validateParam } from "../middleware/validate.js";

export async function getArtifact(_request: Request, ctx: ApiContext, hash: string) {
  const valid = validateParam(hash, artifactHashSchema, `Artifact ${hash} not found`);
  const bytes = await ctx.store.get({ hash: valid });
  return new Response(new Uint8Array(bytes), {
    headers: {
      "Content-Type": "application/octet-stream",
      "Content-Length": String(bytes.length),
      "Cache-Control": "public, max-age=31536000, immutable",
      ETag: `"${valid}"`,
    },
  });
}
