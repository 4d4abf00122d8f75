/**
 * Next.js startup hook: validate the configuration before serving, so a bad
 * environment aborts startup instead of failing on the first request. The
 * route handlers build their own system on first use.
 */

export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    const { loadConfig } = await import("./core/config");
    const config = loadConfig();
    console.log(
      `[Instrumentation] Configuration valid (staleness ${config.stalenessThresholdS}s, speed ${config.assumedSpeedKmh} km/h)`
    );
  }
}
