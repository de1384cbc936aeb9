function toCssVariables(variables: ReadonlyMap<string, string>) {
  const declarations = [...variables].map(([name, value]) => `  ${name.startsWith('--') ? name : `--${name}`}: ${value};`)
  return [' html {', ...declarations, '}'].join('\n')
}

/**
 * Stylesheet for mdpopups based popups (LSP hovers, bracket highlighter
 * panels). Accent variables are declared up front and referenced below.
 */
export function buildPopupCss(popupAccents: Readonly<Record<string, string>>, popupBackground: string, genericBackground: string) {
  const variables = new Map(Object.entries(popupAccents))
  variables.set('mdpopups_background', popupBackground)
  variables.set('popups_background', genericBackground)

  return [
    toCssVariables(variables),
    'html, body {--background: var(--popups_background); border-radius: 2px;}',
    '.mdpopups {--mdpopups-bg: var(--mdpopups_background); --mdpopups-hl-bg: var(--mdpopups_background); --mdpopups-hl-border: none; --mdpopups-link: var(--popup_cyanish);}',
    'a {text-decoration: none; color: var(--popup_cyanish);}',
    '.mdpopups .lsp_popup {--redish: var(--popup_redish); --yellowish: var(--popup_redish); --greenish: var(--popup_greenish);}',
    '.mdpopups .lsp_popup a {color: var(--popup_cyanish);}',
    '.mdpopups .bracket-highlighter .admonition.panel-error {--mdpopups-admon-error-accent: var(--mdpopups_background); --mdpopups-admon-info-accent: var(--mdpopups_background); --mdpopups-admon-warning-accent: var(--mdpopups_background); --mdpopups-admon-success-accent: var(--mdpopups_background);}',
    '.mdpopups .bracket-highlighter .admonition.panel-error .admonition-title {--mdpopups-admon-error-accent: color(var(--popup_redish) alpha(0.25)); --mdpopups-admon-info-accent: color(var(--popup_cyanish) alpha(0.25)); --mdpopups-admon-warning-accent: color(var(--popup_yellowish) alpha(0.25)); --mdpopups-admon-success-accent: color(var(--popup_greenish) alpha(0.25));}',
    '.mdpopups .bracket-highlighter {--mdpopups-admon-info-bg: var(--mdpopups_background); --mdpopups-admon-warning-bg: var(--mdpopups_background); --mdpopups-admon-success-bg: var(--mdpopups_background); --mdpopups-admon-error-bg: var(--mdpopups_background); --mdpopups-link: var(--cyanish);}',
  ].join('\n')
}
