/** Which queries the server answers. A disabled query is refused, never answered empty. */
export interface Features {
  completion: boolean;
  hover: boolean;
  codeActions: boolean;
  gotoDefinition: boolean;
}

export type Feature = keyof Features;

export const ALL_FEATURES: Features = {
  completion: true,
  hover: true,
  codeActions: true,
  gotoDefinition: true,
};
