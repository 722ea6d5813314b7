/**
 * Name/value cookie store for one dashboard session. Attributes (Path,
 * Expires, HttpOnly...) are ignored; every cookie goes back to the same host.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  store(setCookieHeaders: string[] | undefined): void {
    if (!setCookieHeaders) return;
    for (const header of setCookieHeaders) {
      const pair = header.split(";")[0] ?? "";
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (!name) continue;
      this.cookies.set(name, value);
    }
  }

  get size(): number {
    return this.cookies.size;
  }

  toHeader(): string {
    return [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join("; ");
  }
}
