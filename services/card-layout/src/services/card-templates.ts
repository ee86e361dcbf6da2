import { AppError } from '../middleware/error-handler.js';

// ─── Templates ────────────────────────────────────────────────────────

export type CardKind = 'good' | 'bad';

export interface CardTemplate {
  kind: CardKind;
  label: string;
  /** Background image file name inside the assets directory. */
  backgroundImage: string;
  fontColor: string;
  strokeColor: string;
  strokeWidth: number;
}

export const CARD_TEMPLATES: Record<CardKind, CardTemplate> = {
  good: {
    kind: 'good',
    label: 'Good news',
    backgroundImage: 'good_news.jpg',
    fontColor: '#DC3023',
    strokeColor: '#AA0000',
    strokeWidth: 0,
  },
  bad: {
    kind: 'bad',
    label: 'Bad news',
    backgroundImage: 'bad_news.jpg',
    fontColor: '#5A5A5A',
    strokeColor: '#595857',
    strokeWidth: 0,
  },
};

function isCardKind(kind: string): kind is CardKind {
  return Object.prototype.hasOwnProperty.call(CARD_TEMPLATES, kind);
}

export function getTemplate(kind: string): CardTemplate {
  if (!isCardKind(kind)) {
    throw new AppError(404, `Unknown card template: ${kind}`, 'TEMPLATE_NOT_FOUND');
  }
  return CARD_TEMPLATES[kind];
}

// ─── Text Box ─────────────────────────────────────────────────────────
// Text occupies the central 80% × 60% of the background.

export const TEXT_BOX_WIDTH_RATIO = 0.8;
export const TEXT_BOX_HEIGHT_RATIO = 0.6;

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function textBoxFor(imageWidth: number, imageHeight: number): Rect {
  const width = Math.floor(imageWidth * TEXT_BOX_WIDTH_RATIO);
  const height = Math.floor(imageHeight * TEXT_BOX_HEIGHT_RATIO);
  return {
    x: (imageWidth - width) / 2,
    y: (imageHeight - height) / 2,
    width,
    height,
  };
}
