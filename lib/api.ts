import { NextResponse } from "next/server";

import { ServiceError, type ServiceErrorCode } from "./errors";
import { createLogger, errorFields } from "./logger";
import { formatReference } from "./reference";
import type { DailyVerse } from "./service";
import type { Verse } from "./store";

const log = createLogger("http");

export function badRequest(message: string, status = 400, code?: ServiceErrorCode) {
  return NextResponse.json(code ? { error: message, code } : { error: message }, { status });
}

export function ok<T>(data: T, status = 200) {
  return NextResponse.json(data, { status });
}

export function handleRouteError(error: unknown) {
  if (error instanceof ServiceError) {
    return badRequest(error.message, error.status, error.code);
  }

  const message = error instanceof Error ? error.message : "Unexpected server error";
  log.error("unhandled route error", errorFields(error));
  return badRequest(message, 500);
}

export function serializeVerse(verse: Verse) {
  return {
    reference: formatReference(verse),
    book: verse.book,
    chapter: verse.chapter,
    verse: verse.verseNumber,
    kjv: verse.text,
  };
}

export function serializeDailyVerse(daily: DailyVerse) {
  return { date: daily.date, ...serializeVerse(daily.verse) };
}
