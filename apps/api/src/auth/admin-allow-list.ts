function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

/** Process-wide admin emails, fixed at startup. Membership is case-insensitive. */
export class AdminAllowList {
  private readonly emails: ReadonlySet<string>;

  constructor(emails: Iterable<string>) {
    const normalized = new Set<string>();

    for (const email of emails) {
      if (email.trim()) {
        normalized.add(normalizeEmail(email));
      }
    }

    this.emails = normalized;
  }

  includes(email: string | null | undefined) {
    return Boolean(email) && this.emails.has(normalizeEmail(email ?? ""));
  }

  get size() {
    return this.emails.size;
  }
}
