export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") {
    return;
  }

  const { assertCorpusReady } = await import("./lib/corpus");
  const { createLogger, errorFields } = await import("./lib/logger");
  const log = createLogger("startup");

  try {
    const count = await assertCorpusReady();
    log.info("corpus ready", { verses: count });
  } catch (error) {
    log.error("corpus check failed at startup; load verses with `npm run verses:load`", errorFields(error));
  }
}
