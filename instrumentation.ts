export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') {
    return;
  }

  const { getRuntime } = await import('./lib/runtime');
  await getRuntime();
}
