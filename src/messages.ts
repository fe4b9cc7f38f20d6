/**
 * Message catalogs for user-facing text. Log lines stay in English.
 */
import { Context, Layer, Option } from "effect"
import en from "./locales/en.json"
import zh from "./locales/zh.json"

export type MessageKey = keyof typeof en
export type Catalog = Readonly<Record<MessageKey, string>>
export type MessageLanguage = "en" | "zh"

const catalogs: Readonly<Record<MessageLanguage, Catalog>> = { en, zh }

/** Replace `{name}` placeholders; unknown names are left as they are */
export const format = (template: string, values: Readonly<Record<string, string | number>> = {}): string =>
  template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Option.match(Option.fromNullable(values[name]), {
      onNone: () => match,
      onSome: String
    }))

/** `850ms`, `1.25s` */
export const formatDuration = (ms: number): string =>
  ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(2)}s`

interface MessagesInterface {
  readonly language: MessageLanguage
  readonly t: (key: MessageKey, values?: Readonly<Record<string, string | number>>) => string
}

export const makeMessages = (language: MessageLanguage): MessagesInterface => {
  const catalog = catalogs[language]
  return {
    language,
    t: (key, values) => format(catalog[key], values)
  }
}

export class Messages extends Context.Tag("@ucode/Messages")<
  Messages,
  MessagesInterface
>() {
  static layer(language: MessageLanguage): Layer.Layer<Messages> {
    return Layer.succeed(Messages, makeMessages(language))
  }
}
