import { CVar, type CVarCategory, type CVarDesc } from "./CVar.js";

export class CVarRegistry {
  private cvars = new Map<string, CVar>();

  register(desc: CVarDesc): CVar {
    if (this.cvars.has(desc.name)) {
      throw new Error(`[cvar] duplicate registration: ${desc.name}`);
    }
    const cv = new CVar(desc);
    this.cvars.set(desc.name, cv);
    return cv;
  }

  get(name: string): CVar | undefined {
    return this.cvars.get(name);
  }

  getAll(): CVar[] {
    return [...this.cvars.values()];
  }

  getByCategory(category: CVarCategory): CVar[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  /**
   * Apply a `name=value` assignment. Throws on an unknown name or a
   * non-numeric value so a typo on the command line fails loudly.
   */
  assign(assignment: string): CVar {
    const eq = assignment.indexOf("=");
    if (eq <= 0) throw new Error(`[cvar] expected name=value, got "${assignment}"`);
    const name = assignment.slice(0, eq).trim();
    const cv = this.cvars.get(name);
    if (!cv) throw new Error(`[cvar] unknown variable: ${name}`);
    if (!cv.setFromString(assignment.slice(eq + 1))) {
      throw new Error(`[cvar] ${name} expects a number, got "${assignment.slice(eq + 1)}"`);
    }
    return cv;
  }

  resetAll(): void {
    for (const cv of this.cvars.values()) cv.reset();
  }
}
