import type { Color } from "./color.js";
import { isVisible, noColor, sameColor } from "./color.js";

export type TextTransform = (text: string) => string;

export interface StyleProps {
  readonly foreground?: Color;
  readonly background?: Color;
  readonly bold?: boolean;
  readonly italic?: boolean;
  readonly underline?: boolean;
  readonly transform?: TextTransform;
}

/**
 * Visual attributes for a run of characters. Instances never change, so
 * composed styles can be compared and cached by reference.
 */
export class Style {
  static readonly empty: Style = new Style();

  readonly foreground: Color;
  readonly background: Color;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly transform: TextTransform | undefined;

  constructor(props: StyleProps = {}) {
    this.foreground = props.foreground ?? noColor;
    this.background = props.background ?? noColor;
    this.bold = props.bold ?? false;
    this.italic = props.italic ?? false;
    this.underline = props.underline ?? false;
    this.transform = props.transform;
  }

  static make(props: StyleProps = {}): Style {
    return new Style(props);
  }

  get isEmpty(): boolean {
    return (
      !isVisible(this.foreground) &&
      !isVisible(this.background) &&
      !this.bold &&
      !this.italic &&
      !this.underline &&
      this.transform === undefined
    );
  }

  with(props: StyleProps): Style {
    return new Style({
      foreground: props.foreground ?? this.foreground,
      background: props.background ?? this.background,
      bold: props.bold ?? this.bold,
      italic: props.italic ?? this.italic,
      underline: props.underline ?? this.underline,
      transform: props.transform ?? this.transform,
    });
  }

  /** Runs the text transform, if any. */
  apply(text: string): string {
    return this.transform ? this.transform(text) : text;
  }

  /** Attribute equality; transforms compare by reference. */
  equals(other: Style): boolean {
    return (
      sameColor(this.foreground, other.foreground) &&
      sameColor(this.background, other.background) &&
      this.bold === other.bold &&
      this.italic === other.italic &&
      this.underline === other.underline &&
      this.transform === other.transform
    );
  }
}
