/**
 * Sample page layout.
 *
 * A4 pages: title, subtitle, introduction, feature list, a vector figure
 * with caption, and a footer. Content that reaches the bottom margin
 * continues on a new page. Text is word-wrapped against the standard
 * Helvetica faces, so it must be WinAnsi-encodable.
 */

import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage, type RGB } from "pdf-lib";

const A4 = { width: 595.28, height: 841.89 } as const;
const MARGIN = 50;

const COLORS = {
  text: rgb(33 / 255, 37 / 255, 41 / 255),
  muted: rgb(108 / 255, 117 / 255, 125 / 255),
  feature: rgb(73 / 255, 80 / 255, 87 / 255),
  rule: rgb(206 / 255, 212 / 255, 218 / 255),
  blue: rgb(66 / 255, 133 / 255, 244 / 255),
  orange: rgb(251 / 255, 188 / 255, 4 / 255),
  green: rgb(52 / 255, 168 / 255, 83 / 255),
  red: rgb(234 / 255, 67 / 255, 53 / 255),
} as const;

/** WinAnsi characters above Latin-1 that the standard fonts can draw. */
const WIN_ANSI_EXTRAS = "€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ";

export interface PageContent {
  title: string;
  subtitle: string;
  introduction: string;
  featuresHeading: string;
  features: readonly string[];
  figureHeading: string;
  figureCaption: string;
  footerLines: readonly string[];
}

interface Cursor {
  document: PDFDocument;
  page: PDFPage;
  y: number;
}

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
  italic: PDFFont;
}

interface TextStyle {
  font: PDFFont;
  size: number;
  color: RGB;
  align?: "left" | "center" | "justify";
  indent?: number;
  spaceBefore?: number;
  spaceAfter?: number;
}

/**
 * Replace characters the standard fonts cannot encode.
 */
export function toWinAnsi(text: string): string {
  return Array.from(text)
    .map((ch) => {
      const code = ch.charCodeAt(0);
      const printable = (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff);
      return printable || WIN_ANSI_EXTRAS.includes(ch) ? ch : "?";
    })
    .join("");
}

/**
 * Greedy word wrap.
 */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = current ? `${current} ${word}` : word;
    if (current && font.widthOfTextAtSize(candidate, size) > maxWidth) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) {
    lines.push(current);
  }
  return lines;
}

/**
 * Start a new page unless `height` more points fit above the bottom margin.
 */
function ensureRoom(cursor: Cursor, height: number): void {
  if (cursor.y - height >= MARGIN) {
    return;
  }
  cursor.page = cursor.document.addPage([A4.width, A4.height]);
  cursor.y = A4.height - MARGIN;
}

function drawParagraph(cursor: Cursor, text: string, style: TextStyle): void {
  const indent = style.indent ?? 0;
  const maxWidth = A4.width - 2 * MARGIN - indent;
  const lineHeight = style.size * 1.4;
  const lines = wrapText(toWinAnsi(text), style.font, style.size, maxWidth);

  cursor.y -= style.spaceBefore ?? 0;

  lines.forEach((line, index) => {
    ensureRoom(cursor, lineHeight);
    cursor.y -= lineHeight;
    const width = style.font.widthOfTextAtSize(line, style.size);
    const isLast = index === lines.length - 1;
    let x = MARGIN + indent;

    if (style.align === "center") {
      x = (A4.width - width) / 2;
    }

    if (style.align === "justify" && !isLast) {
      const words = line.split(" ");
      const gap = words.length > 1 ? (maxWidth - width) / (words.length - 1) : 0;
      const spaceWidth = style.font.widthOfTextAtSize(" ", style.size);
      for (const word of words) {
        cursor.page.drawText(word, { x, y: cursor.y, size: style.size, font: style.font, color: style.color });
        x += style.font.widthOfTextAtSize(word, style.size) + spaceWidth + gap;
      }
      return;
    }

    cursor.page.drawText(line, { x, y: cursor.y, size: style.size, font: style.font, color: style.color });
  });

  cursor.y -= style.spaceAfter ?? 0;
}

/**
 * Geometric figure drawn with vector primitives, 300pt wide.
 */
function drawFigure(cursor: Cursor): void {
  const width = 300;
  const height = 225;
  const scale = width / 400;
  const left = (A4.width - width) / 2;
  ensureRoom(cursor, height);
  const top = cursor.y;
  const at = (x: number, y: number) => ({ x: left + x * scale, y: top - y * scale });

  cursor.page.drawRectangle({
    x: left,
    y: top - height,
    width,
    height,
    color: rgb(1, 1, 1),
    borderColor: COLORS.rule,
    borderWidth: 0.5,
  });

  const circles = [
    { cx: 125, cy: 125, r: 75, color: COLORS.blue },
    { cx: 190, cy: 150, r: 70, color: COLORS.orange },
    { cx: 265, cy: 165, r: 65, color: COLORS.green },
  ];
  for (const circle of circles) {
    const centre = at(circle.cx, circle.cy);
    cursor.page.drawCircle({ ...centre, size: circle.r * scale, color: circle.color });
  }

  const rects = [
    { x: 280, y: 40, w: 80, h: 80, color: COLORS.red },
    { x: 100, y: 200, w: 200, h: 60, color: COLORS.blue },
  ];
  for (const r of rects) {
    const bottomLeft = at(r.x, r.y + r.h);
    cursor.page.drawRectangle({ ...bottomLeft, width: r.w * scale, height: r.h * scale, color: r.color });
  }

  cursor.y = top - height;
}

function drawRule(cursor: Cursor): void {
  ensureRoom(cursor, 40);
  cursor.y -= 30;
  cursor.page.drawLine({
    start: { x: MARGIN, y: cursor.y },
    end: { x: A4.width - MARGIN, y: cursor.y },
    thickness: 0.75,
    color: COLORS.rule,
  });
  cursor.y -= 10;
}

/**
 * Add the sample page to `document`, plus continuation pages as needed.
 */
export async function layoutSamplePage(document: PDFDocument, content: PageContent): Promise<void> {
  const fonts: Fonts = {
    regular: await document.embedFont(StandardFonts.Helvetica),
    bold: await document.embedFont(StandardFonts.HelveticaBold),
    italic: await document.embedFont(StandardFonts.HelveticaOblique),
  };

  const page = document.addPage([A4.width, A4.height]);
  const cursor: Cursor = { document, page, y: A4.height - MARGIN };

  drawParagraph(cursor, content.title, {
    font: fonts.bold, size: 28, color: COLORS.text, align: "center", spaceAfter: 20,
  });
  drawParagraph(cursor, content.subtitle, {
    font: fonts.regular, size: 16, color: COLORS.muted, align: "center", spaceAfter: 24,
  });
  drawParagraph(cursor, content.introduction, {
    font: fonts.regular, size: 12, color: COLORS.text, align: "justify", spaceAfter: 12,
  });
  drawParagraph(cursor, content.featuresHeading, {
    font: fonts.bold, size: 14, color: COLORS.text, spaceBefore: 8, spaceAfter: 4,
  });
  for (const feature of content.features) {
    drawParagraph(cursor, `• ${feature}`, {
      font: fonts.regular, size: 11, color: COLORS.feature, indent: 20, spaceAfter: 2,
    });
  }

  drawParagraph(cursor, content.figureHeading, {
    font: fonts.bold, size: 14, color: COLORS.text, spaceBefore: 16, spaceAfter: 10,
  });
  drawFigure(cursor);
  drawParagraph(cursor, content.figureCaption, {
    font: fonts.italic, size: 10, color: COLORS.muted, align: "center", spaceBefore: 6,
  });

  drawRule(cursor);
  for (const line of content.footerLines) {
    drawParagraph(cursor, line, { font: fonts.regular, size: 9, color: COLORS.muted, align: "center" });
  }
}
