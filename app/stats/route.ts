import { handleRouteError, ok } from "@/lib/api";
import { getCorpusStats } from "@/lib/service";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const data = await getCorpusStats();
    return ok(data);
  } catch (error) {
    return handleRouteError(error);
  }
}
