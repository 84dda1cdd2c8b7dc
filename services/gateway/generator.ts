// services/gateway/generator.ts
// Template bot used when the model is disabled or its answer is unusable.

export const DEFAULT_BOT_NAME = 'GeneratedBot'

/** Turns a free-form bot name into a JS class identifier. */
export function toClassName(botName: string): string {
  const cleaned = botName.trim().replace(/[^A-Za-z0-9_$]/g, '_')
  if (!cleaned) return DEFAULT_BOT_NAME
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned
}

export function renderBotTemplate(botName: string, now: Date = new Date()): string {
  const cls = toClassName(botName)
  const createdAt = JSON.stringify(now.toISOString())
  return `
class ${cls} {
  constructor(name, skills) {
    this.name = name;
    this.skills = Array.isArray(skills) ? skills : [];
    this.createdAt = ${createdAt};
  }

  async execute(task) {
    await new Promise((resolve) => setTimeout(resolve, 100));
    const text = String(task ?? '');
    const lowered = text.toLowerCase();

    if (lowered.includes('analyze')) {
      return {
        ok: true,
        result: \`Analysis completed for: \${text}\`,
        bot: this.name,
        skillsUsed: this.skills.filter((s) => s === 'analysis' || s === 'thinking'),
      };
    }
    if (lowered.includes('code')) {
      return {
        ok: true,
        result: \`Code execution simulated for: \${text}\`,
        note: 'Use sandbox for actual execution',
      };
    }
    return {
      ok: true,
      result: \`Task completed: \${text}\`,
      bot: this.name,
      executedAt: new Date().toISOString(),
    };
  }

  toString() {
    return \`${cls}(skills=\${this.skills.join(',')})\`;
  }
}

module.exports = ${cls};
`.trim() + '\n'
}
