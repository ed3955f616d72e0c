/** Raw fetch wrapper, the mockable HTTP boundary for asset downloads. */
export async function fetchRaw(url: string, options?: RequestInit): Promise<Response> {
  return fetch(url, options)
}
