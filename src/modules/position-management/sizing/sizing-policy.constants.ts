export const SIZING_POLICY = 'ISizingPolicy';
