import { ServiceError } from "@/lib/errors";
import { formatReference } from "@/lib/reference";
import { getSelectionHistory, resolveVerseForToday, type DailyVerse } from "@/lib/service";
import type { DailySelection } from "@/lib/store";

export const dynamic = "force-dynamic";

type PageData =
  | { kind: "ready"; today: DailyVerse; history: DailySelection[] }
  | { kind: "unavailable"; message: string };

async function loadPageData(): Promise<PageData> {
  try {
    const today = await resolveVerseForToday();
    const history = await getSelectionHistory({ limit: 8 });
    return { kind: "ready", today, history: history.filter((item) => item.date !== today.date) };
  } catch (error) {
    if (error instanceof ServiceError) {
      return { kind: "unavailable", message: error.message };
    }
    throw error;
  }
}

function formatLongDate(isoDate: string): string {
  return new Intl.DateTimeFormat("en-US", {
    weekday: "long",
    month: "long",
    day: "numeric",
    year: "numeric",
    timeZone: "UTC",
  }).format(new Date(`${isoDate}T00:00:00Z`));
}

export default async function Home() {
  const data = await loadPageData();

  return (
    <main style={{ maxWidth: 640, margin: "0 auto", padding: "64px 24px" }}>
      <p style={{ letterSpacing: "0.2em", textTransform: "uppercase", fontSize: 12, opacity: 0.6 }}>
        Verse of the Day
      </p>

      {data.kind === "unavailable" ? (
        <p style={{ fontSize: 18 }}>{data.message}</p>
      ) : (
        <>
          <h1 style={{ fontWeight: 400, fontSize: 14, opacity: 0.7 }}>{formatLongDate(data.today.date)}</h1>
          <blockquote style={{ margin: "24px 0", fontSize: 26, lineHeight: 1.5 }}>
            {data.today.verse.text}
          </blockquote>
          <p style={{ fontSize: 16, opacity: 0.85 }}>{formatReference(data.today.verse)}</p>

          {data.history.length > 0 && (
            <section style={{ marginTop: 56 }}>
              <h2 style={{ fontWeight: 400, fontSize: 14, opacity: 0.6 }}>Previous days</h2>
              <ul style={{ listStyle: "none", padding: 0 }}>
                {data.history.map((item) => (
                  <li key={item.date} style={{ padding: "6px 0", display: "flex", gap: 16 }}>
                    <span style={{ opacity: 0.5, fontFamily: "monospace" }}>{item.date}</span>
                    <span>{formatReference(item.verse)}</span>
                  </li>
                ))}
              </ul>
            </section>
          )}
        </>
      )}
    </main>
  );
}
