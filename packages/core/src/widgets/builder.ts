import { Button, type ButtonCallback } from "./button.js";
import { Label, type LabelOptions } from "./label.js";
import { ProgressBar, type ProgressBarOptions } from "./progressBar.js";
import { Row } from "./row.js";
import { TextInput } from "./textInput.js";
import type { Widget } from "./widget.js";

/**
 * Fluent construction helper exposed as `popup.add` / `row.add`.
 *
 * Leaf widgets without state worth keeping (labels, buttons) chain;
 * stateful ones are returned so the caller can hold on to them.
 */
export class WidgetBuilder {
  private readonly parent: Widget;

  constructor(parent: Widget) {
    this.parent = parent;
  }

  label(text: string, options?: LabelOptions): this {
    this.parent.addChild(new Label(text, options));
    return this;
  }

  button(text: string, callback?: ButtonCallback): this {
    this.parent.addChild(new Button(text, callback ?? null));
    return this;
  }

  textInput(text?: string): TextInput {
    return this.parent.addChild(new TextInput(text));
  }

  progressBar(options?: ProgressBarOptions): ProgressBar {
    return this.parent.addChild(new ProgressBar(options));
  }

  row(spacing?: number): Row {
    return this.parent.addChild(new Row(spacing));
  }
}
