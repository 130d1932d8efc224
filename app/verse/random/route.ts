import { handleRouteError, ok, serializeVerse } from "@/lib/api";
import { pickRandomVerse } from "@/lib/service";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const verse = await pickRandomVerse();
    return ok(serializeVerse(verse));
  } catch (error) {
    return handleRouteError(error);
  }
}
