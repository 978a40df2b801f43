import type { SettingsSource } from "../../ports/settings-source"

export class ObjectSettingsSource implements SettingsSource {
  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    readonly name = "object",
  ) {}

  load(): Readonly<Record<string, unknown>> {
    return { ...this.values }
  }
}
