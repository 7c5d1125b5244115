import { z } from "zod";
import { SHOW_FORMS } from "./types";

export const StringFacesSchema = z.array(z.string());
export const NumberFacesSchema = z.array(z.number().finite());

/** Faces are one homogeneous array; mixed string/number arrays match neither branch. */
export const FacesSchema = z.union([StringFacesSchema, NumberFacesSchema]);

// z.number() already rejects NaN
export const WeightSchema = z.number();

export const RollCountSchema = z.number().int().nonnegative();

export const ShowFormSchema = z.enum(SHOW_FORMS);
