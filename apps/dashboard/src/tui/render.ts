import type { BarView, ChartPanel, LegendEntry } from "../view/chart-view";
import type { DashboardFrame, Frame, Rect } from "../view/frame-model";
import type { OptionItem, OptionsColumnView } from "../view/options-view";
import type { Palette } from "../view/palette";
import type { SummaryView } from "../view/summary-view";
import { type CellStyle, clipText, createScreenBuffer, type ScreenBuffer } from "./screen-buffer";

const BAR_CHAR = "█";
const TRACK_CHAR = "─";
const THUMB_CHAR = "━";
const LEGEND_SWATCH = "■";
const PROMPT_WIDTH = 60;
const PROMPT_HEIGHT = 5;

const inner = (rect: Rect): Rect => ({
  x: rect.x + 1,
  y: rect.y + 1,
  width: Math.max(0, rect.width - 2),
  height: Math.max(0, rect.height - 2),
});

const borderStyle = (palette: Palette, active = false): CellStyle =>
  active ? { fg: palette.primary, bold: true } : { fg: "darkGray" };

const itemStyle = (item: OptionItem, palette: Palette): CellStyle => {
  if (item.cursor) {
    return { fg: palette.selectedFg, bg: palette.selectedBg, bold: true };
  }
  if (item.disabled) {
    return { fg: "darkGray" };
  }
  if (item.selected) {
    return { fg: palette.primary, bold: true };
  }
  return {};
};

const drawItem = (
  buffer: ScreenBuffer,
  position: { x: number; y: number; width: number },
  item: OptionItem,
  palette: Palette,
) => {
  const { x, y, width } = position;
  const prefix = item.cursor ? "> " : "  ";
  buffer.writeText(x, y, clipText(`${prefix}${item.label}`, width), itemStyle(item, palette));
};

const drawOptionsColumn = (
  buffer: ScreenBuffer,
  column: OptionsColumnView,
  area: Rect,
  palette: Palette,
) => {
  buffer.writeText(
    area.x,
    area.y,
    clipText(column.title, area.width),
    column.active ? { fg: palette.primary, bold: true } : { bold: true },
  );
  column.items.forEach((item, index) => {
    drawItem(buffer, { x: area.x, y: area.y + 1 + index, width: area.width }, item, palette);
  });
  if (!column.filter) {
    return;
  }
  const top = area.y + column.items.length + 2;
  column.filter.items.forEach((item, index) => {
    const y = top + index;
    if (y >= area.y + area.height) {
      return;
    }
    drawItem(buffer, { x: area.x + 1, y, width: area.width - 1 }, item, palette);
  });
};

const drawOptions = (buffer: ScreenBuffer, frame: DashboardFrame) => {
  const rect = frame.regions.options;
  buffer.drawBox(rect, { title: "Options", style: borderStyle(frame.palette) });
  const area = inner(rect);
  const columnWidth = Math.floor(area.width / frame.options.length);
  frame.options.forEach((column, index) => {
    drawOptionsColumn(
      buffer,
      column,
      { x: area.x + index * columnWidth, y: area.y, width: columnWidth - 1, height: area.height },
      frame.palette,
    );
  });
};

const drawSummary = (buffer: ScreenBuffer, frame: DashboardFrame, summary: SummaryView | string) => {
  const rect = frame.regions.summary;
  buffer.drawBox(rect, { title: "Summary", style: borderStyle(frame.palette) });
  const area = inner(rect);
  if (typeof summary === "string") {
    buffer.writeText(area.x + 1, area.y, clipText(summary, area.width - 1), { dim: true });
    return;
  }
  buffer.writeText(area.x + 1, area.y, clipText(summary.span, area.width - 1), { dim: true });
  const sectionWidth = Math.floor((area.width - 1) / summary.sections.length);
  summary.sections.forEach((section, sectionIndex) => {
    const x = area.x + 1 + sectionIndex * sectionWidth;
    const width = sectionWidth - 1;
    buffer.writeText(x, area.y + 2, clipText(section.title, width), {
      fg: frame.palette.primary,
      bold: true,
    });
    section.lines.forEach((line, lineIndex) => {
      const y = area.y + 3 + lineIndex;
      if (y >= area.y + area.height) {
        return;
      }
      const toneStyle: CellStyle =
        line.tone === "up" ? { fg: "red" } : line.tone === "down" ? { fg: "green" } : {};
      const label = `${line.label}: `;
      const written = buffer.writeText(x, y, clipText(label, width), { dim: true });
      buffer.writeText(x + written, y, clipText(line.value, width - written), toneStyle);
    });
  });
};

const drawBar = (buffer: ScreenBuffer, bar: BarView, area: Rect, bottom: number) => {
  let y = bottom;
  bar.segments.forEach((segment) => {
    const segmentTop = y - segment.height + 1;
    for (let row = y; row >= segmentTop; row -= 1) {
      buffer.writeText(area.x + bar.x, row, BAR_CHAR.repeat(bar.width), { fg: segment.color });
    }
    if (segment.valueLabel) {
      const middle = Math.floor((y + segmentTop) / 2);
      const offset = Math.floor((bar.width - Array.from(segment.valueLabel).length) / 2);
      buffer.writeText(area.x + bar.x + offset, middle, segment.valueLabel, {
        fg: "black",
        bg: segment.color,
      });
    }
    y = segmentTop - 1;
  });
  if (bar.totalLabel) {
    const label = clipText(bar.capped ? `${bar.totalLabel}↑` : bar.totalLabel, bar.width);
    const offset = Math.floor((bar.width - Array.from(label).length) / 2);
    buffer.writeText(area.x + bar.x + offset, y, label, { bold: true });
  }
  const dateOffset = Math.floor((bar.width - Array.from(bar.dateLabel).length) / 2);
  buffer.writeText(area.x + bar.x + dateOffset, bottom + 1, bar.dateLabel, { dim: true });
};

const drawLegend = (
  buffer: ScreenBuffer,
  title: string,
  entries: LegendEntry[],
  area: Rect,
) => {
  buffer.writeText(area.x, area.y, clipText(title, area.width), { bold: true });
  entries.forEach((entry, index) => {
    const y = area.y + 1 + index * 2;
    if (y + 1 >= area.y + area.height) {
      return;
    }
    buffer.writeText(area.x, y, LEGEND_SWATCH, { fg: entry.color });
    buffer.writeText(area.x + 2, y, clipText(entry.label, area.width - 2));
    buffer.writeText(area.x + 2, y + 1, clipText(entry.detail, area.width - 2), { dim: true });
  });
};

const drawChartPanel = (buffer: ScreenBuffer, frame: DashboardFrame, panel: ChartPanel) => {
  const rect = frame.regions.chart;
  buffer.drawBox(rect, {
    title: panel.title,
    style: borderStyle(frame.palette),
    titleStyle: { fg: frame.palette.primary, bold: true },
  });
  const area = inner(rect);

  if (panel.kind === "message") {
    const y = area.y + Math.floor(area.height / 2);
    buffer.writeCentered(
      area,
      y,
      panel.message,
      panel.tone === "error" ? { fg: frame.palette.error, bold: true } : { dim: true },
    );
    return;
  }

  // Value-label row on top, then the bars, the date row and the scrollbar.
  const bottom = area.y + panel.barAreaHeight;
  panel.bars.forEach((bar) => drawBar(buffer, bar, area, bottom));

  if (panel.scrollbar) {
    const y = bottom + 2;
    buffer.writeText(area.x, y, TRACK_CHAR.repeat(panel.scrollbar.trackLength), { fg: "darkGray" });
    buffer.writeText(
      area.x + panel.scrollbar.thumbStart,
      y,
      THUMB_CHAR.repeat(panel.scrollbar.thumbLength),
      { fg: frame.palette.primary },
    );
  }

  if (panel.legendWidth > 0) {
    drawLegend(buffer, panel.legendTitle, panel.legend, {
      x: area.x + panel.plotWidth + 1,
      y: area.y,
      width: panel.legendWidth - 1,
      height: area.height,
    });
  }
};

const drawPrompt = (buffer: ScreenBuffer, frame: DashboardFrame) => {
  if (!frame.prompt) {
    return;
  }
  const width = Math.min(PROMPT_WIDTH, frame.width - 4);
  const rect: Rect = {
    x: Math.floor((frame.width - width) / 2),
    y: Math.floor((frame.height - PROMPT_HEIGHT) / 2),
    width,
    height: PROMPT_HEIGHT,
  };
  buffer.fillRect(rect);
  buffer.drawBox(rect, {
    title: frame.prompt.title,
    style: borderStyle(frame.palette, true),
    titleStyle: { fg: frame.palette.primary, bold: true },
  });
  const area = inner(rect);
  const input = `> ${frame.prompt.maskedInput}`;
  // Keep the end of long input visible.
  const visible = Array.from(input).slice(-(area.width - 2)).join("");
  buffer.writeText(area.x + 1, area.y + 1, visible);
  buffer.writeText(area.x + 1 + Array.from(visible).length, area.y + 1, " ", {
    bg: frame.palette.primary,
  });
};

const drawDashboard = (buffer: ScreenBuffer, frame: DashboardFrame) => {
  const { header, footer } = frame.regions;
  buffer.writeText(header.x, header.y, clipText(frame.header.title, header.width), {
    fg: frame.palette.primary,
    bold: true,
  });
  if (frame.header.status) {
    const status = clipText(frame.header.status, header.width);
    buffer.writeText(header.x + header.width - Array.from(status).length, header.y, status, {
      fg: frame.palette.accent,
    });
  }
  drawOptions(buffer, frame);
  drawSummary(buffer, frame, frame.summary);
  drawChartPanel(buffer, frame, frame.chart);
  buffer.writeText(footer.x, footer.y, clipText(frame.footer, footer.width), { fg: "darkGray" });
  drawPrompt(buffer, frame);
};

export const renderFrame = (frame: Frame): ScreenBuffer => {
  const buffer = createScreenBuffer(frame.width, frame.height);
  switch (frame.kind) {
    case "tooSmall":
      buffer.writeCentered(
        { x: 0, y: 0, width: frame.width, height: frame.height },
        Math.floor(frame.height / 2),
        frame.message,
        { fg: "yellow" },
      );
      return buffer;
    case "dashboard":
      drawDashboard(buffer, frame);
      return buffer;
  }
};
