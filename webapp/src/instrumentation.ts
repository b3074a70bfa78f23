export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;
  const { getStore } = await import("@core/runtime");
  const { ExpirySweeper } = await import("@core/sweeper");

  const sweeper = new ExpirySweeper(getStore());
  sweeper.start();
  process.once("SIGTERM", () => {
    sweeper.stop().catch((error: unknown) => console.error("❌ Sweeper shutdown failed", error));
  });
}
