import { z } from "zod";
import {
  BRIGHTNESS_MAX,
  BRIGHTNESS_MIN,
  DEFAULT_ALPHA_THRESHOLD,
  DEFAULT_MAX_UNDO_DEPTH,
  DEFAULT_MS_PER_FRAME,
  MAX_U16,
} from "@/app/constants";

const dimension = z.number().int().min(1).max(MAX_U16);

export const EditorSettingsSchema = z.object({
  maxUndoDepth: z.number().int().min(1).max(1000).default(DEFAULT_MAX_UNDO_DEPTH),
  msPerFrame: z.number().int().min(30).max(500).default(DEFAULT_MS_PER_FRAME),
  brightness: z.number().min(BRIGHTNESS_MIN).max(BRIGHTNESS_MAX).default(1.2),
  brushSize: z.number().int().min(1).max(20).default(1),
  brushIndex: z.number().int().min(0).max(255).default(1),
  fillMode: z.boolean().default(false),
  alphaThreshold: z.number().int().min(0).max(255).default(DEFAULT_ALPHA_THRESHOLD),
  newSpriteDefaults: z
    .object({
      width: dimension.default(256),
      height: dimension.default(256),
      frames: dimension.default(64),
    })
    .default({}),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type EditorSettings = z.infer<typeof EditorSettingsSchema>;
export type EditorSettingsInput = z.input<typeof EditorSettingsSchema>;

/** Throws a ZodError on invalid input; missing keys take their defaults. */
export const parseEditorSettings = (input: unknown = {}): EditorSettings => EditorSettingsSchema.parse(input);

export const safeParseEditorSettings = (input: unknown) => EditorSettingsSchema.safeParse(input);

export type SettingChange = {
  /** Dot-path to the setting that changed, e.g. "newSpriteDefaults.width" */
  path: string;
  newValue: unknown;
};

/** Apply one change immutably. Unknown paths are ignored; the result is re-validated. */
export function applySettingsChange(settings: EditorSettings, change: SettingChange): EditorSettings {
  const parts = change.path.split(".");
  const head = parts[0];
  const tail: string | undefined = parts[1];
  if (parts.length > 2 || !(head in settings)) return settings;
  const next: Record<string, unknown> = { ...settings };

  if (tail === undefined) {
    next[head] = change.newValue;
  } else {
    const inner = next[head];
    if (typeof inner !== "object" || inner === null || !(tail in inner)) return settings;
    next[head] = { ...inner, [tail]: change.newValue };
  }
  return parseEditorSettings(next);
}
