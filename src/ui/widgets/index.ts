export { button, type ButtonConfig, type ButtonResult } from "./Button";
export { checkbox, type CheckboxConfig, type CheckboxResult } from "./Checkbox";
export { radioButton, type RadioButtonConfig, type RadioButtonResult } from "./RadioButton";
export { slider, type SliderConfig, type SliderResult } from "./Slider";
export {
  collapsingHeader,
  type CollapsingHeaderConfig,
  type CollapsingHeaderResult,
} from "./CollapsingHeader";
