import { config } from '@headline/config';
import {
  fitText,
  lineAdvance,
  placeLines,
  selectMetrics,
  type FitResult,
  type FontSet,
  type LinePlacement,
} from '@headline/text-fit';
import { getTemplate, textBoxFor, type CardTemplate, type Rect } from './card-templates.js';

export interface FitSettings {
  initialFontSize: number;
  minFontSize: number;
  fontSizeStep: number;
}

export interface CardPlanInput {
  text: string;
  kind: string;
  imageWidth: number;
  imageHeight: number;
}

export interface CardPlan {
  template: CardTemplate;
  image: { width: number; height: number };
  textBox: Rect;
  fit: FitResult;
  lineAdvance: number;
  /** Line positions in image coordinates. */
  placements: LinePlacement[];
}

export function fitSettingsFromConfig(): FitSettings {
  return {
    initialFontSize: config.FIT_INITIAL_FONT_SIZE,
    minFontSize: config.FIT_MIN_FONT_SIZE,
    fontSizeStep: config.FIT_FONT_SIZE_STEP,
  };
}

/**
 * Everything a compositor needs to draw a card: styling, the text box inside
 * the background, and where each line goes.
 */
export function planCard(input: CardPlanInput, fonts: FontSet, settings: FitSettings = fitSettingsFromConfig()): CardPlan {
  const template = getTemplate(input.kind);
  const textBox = textBoxFor(input.imageWidth, input.imageHeight);

  const fit = fitText(
    {
      text: input.text,
      boxWidth: textBox.width,
      boxHeight: textBox.height,
      ...settings,
    },
    fonts,
  );

  const metrics = selectMetrics(fit.glyphClass, fonts);
  return {
    template,
    image: { width: input.imageWidth, height: input.imageHeight },
    textBox,
    fit,
    lineAdvance: lineAdvance(fit.fontSize),
    placements: placeLines(fit, textBox, metrics, { x: textBox.x, y: textBox.y }),
  };
}
