import { handleRouteError, ok, serializeDailyVerse } from "@/lib/api";
import { resolveVerseForToday } from "@/lib/service";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const daily = await resolveVerseForToday();
    return ok(serializeDailyVerse(daily));
  } catch (error) {
    return handleRouteError(error);
  }
}
