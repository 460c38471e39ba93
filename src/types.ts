export type TemperatureScale = "celsius" | "fahrenheit";

// One recognized command-line option, after long-name and cluster expansion.
export type OptionAction = { type: "scale"; scale: TemperatureScale } | { type: "help" };

export type ArgumentToken = { type: "option"; action: OptionAction } | { type: "positional"; value: string };

export type ParsedCommand =
  | { kind: "help" }
  | {
      kind: "compute";
      scale: TemperatureScale;
      temperatureText: string;
      humidityText: string;
    };

export interface Reading {
  temperature: number;
  humidity: number;
}

export interface OutputSink {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}
