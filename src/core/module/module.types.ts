/** `hold`: EMPTY and FAILED reports keep `untilTS` at the window start. */
export type WatermarkPolicy = "advance" | "hold";

export type Module = {
  moduleID: number;
  moduleName: string;
  watermark?: WatermarkPolicy;
};

export const describeModule = (module: Module): string => `${module.moduleID}-${module.moduleName}`;
