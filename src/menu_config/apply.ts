import type { Menu } from "../menu/menu.js"
import type { ResolvedMenuConfig } from "./types.js"

/**
 * Pushes a resolved configuration onto a menu. Configured keys are added to
 * the built-in bindings. Preview placement and label only apply to a menu that
 * already has a preview.
 */
export const applyMenuConfig = <T>(menu: Menu<T>, config: ResolvedMenuConfig): Menu<T> => {
  menu
    .asciiOnly(config.display.asciiOnly)
    .colorMode(config.display.colorMode)
    .icon(config.icons.item)
    .selectedIcon(config.icons.chosen)
    .boxed(config.layout.boxed)
    .multiselect(config.selection.multiselect)

  if (menu.hasPreview) {
    menu.previewPosition(config.preview.side, config.preview.width).previewLabel(config.preview.label)
  }

  for (const code of config.keys.moveUp) menu.addUpKey(code)
  for (const code of config.keys.moveDown) menu.addDownKey(code)
  for (const code of config.keys.select) menu.addSelectKey(code)
  for (const code of config.keys.toggleSelect) menu.addMultiselectKey(code)
  return menu
}
