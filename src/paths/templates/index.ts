import { HopVariant } from '../types/path.types';
import { fourHopTemplate } from './four-hop.template';
import { oneHopTemplate } from './one-hop.template';
import { PathTemplate } from './path-template';

export * from './four-hop.template';
export * from './one-hop.template';
export * from './path-template';

const TEMPLATES: Record<HopVariant, PathTemplate> = {
  'one-hop': oneHopTemplate,
  'four-hop': fourHopTemplate,
};

export function getPathTemplate(variant: HopVariant): PathTemplate {
  return TEMPLATES[variant];
}
