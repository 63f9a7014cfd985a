import type { MapTheme } from "./types.js";

const base: MapTheme = {
  name: "grey",
  baseSize: 11,
  fontFamily: "Helvetica, Arial, sans-serif",
  background: "#ffffff",
  panelBackground: "#ebebeb",
  graticule: "#ffffff",
  titleWeight: "normal",
  titleAlign: "start",
  titleScale: 1.2,
  subtitleScale: 1,
  textColor: "#1a1a1a",
  legendPosition: "right",
  legendDirection: "vertical",
  legendTitleStyle: "normal",
  marginMm: [2, 2, 2, 2],
};

export const themes: Record<string, MapTheme> = {
  grey: base,
  minimal: { ...base, name: "minimal", panelBackground: "#ffffff", graticule: "#e5e5e5" },
  bw: { ...base, name: "bw", panelBackground: "#ffffff", panelBorder: "#333333", graticule: "#ebebeb" },
  clean: {
    ...base,
    name: "clean",
    panelBackground: "#ffffff",
    graticule: undefined,
    titleWeight: "bold",
    legendPosition: "right",
  },
  wsj: {
    ...base,
    name: "wsj",
    fontFamily: "Georgia, serif",
    background: "#f8f2e4",
    panelBackground: "#f8f2e4",
    graticule: "#d9d2c1",
    titleWeight: "bold",
    titleScale: 1.5,
    legendPosition: "bottom",
    legendDirection: "horizontal",
    marginMm: [6, 6, 6, 6],
  },
};

export function getTheme(name: string): MapTheme {
  const theme = themes[name];
  if (!theme) throw new Error(`Unknown theme: ${name}`);
  return theme;
}

/**
 * Print-oriented theme: bold centred title, no grid or panel border,
 * horizontal legend under the map with an italic title.
 */
export function publicationTheme(baseSize = 12, fontFamily = base.fontFamily): MapTheme {
  return {
    ...themes.bw,
    name: "publication",
    baseSize,
    fontFamily,
    panelBorder: undefined,
    graticule: undefined,
    titleWeight: "bold",
    titleAlign: "middle",
    titleScale: 1.2,
    subtitleScale: 1,
    legendPosition: "bottom",
    legendDirection: "horizontal",
    legendTitleStyle: "italic",
    marginMm: [10, 8, 6, 8],
  };
}
