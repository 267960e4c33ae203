import type { Recipe } from '../installers/context.js'
import type { RecipeId } from '../installers/types.js'
import { prepareSystem } from './prepareSystem.js'
import { dockerInstall } from './dockerInstall.js'
import { buildOpencv } from './buildOpencv.js'

export const RECIPES: Record<RecipeId, Recipe> = {
  'prepare-system': prepareSystem,
  'docker-install': dockerInstall,
  'build-opencv': buildOpencv
}

export { prepareSystem, dockerInstall, buildOpencv }
