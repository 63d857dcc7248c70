export async function dispose(target: AsyncDisposable) {
  await target[Symbol.asyncDispose]();
}
