import type { EffectDefinition } from "../runtime/effect.js";
import { BouncingBallDefinition } from "./effects/bouncingBall.js";
import { CityscapeDefinition } from "./effects/cityscape.js";
import { FadeoutDefinition } from "./effects/fadeout.js";
import { FishDefinition } from "./effects/fishSaver.js";
import { GlobeDefinition } from "./effects/globe.js";
import { HardRainDefinition } from "./effects/hardRain.js";
import { ClassicLifeformsDefinition, LifeformsDefinition } from "./effects/lifeforms.js";
import { LogoDefinition } from "./effects/logo.js";
import { MatrixDefinition } from "./effects/matrix.js";
import { MessagesDefinition, QuoteMessagesDefinition } from "./effects/messages.js";
import { PaperFireDefinition } from "./effects/paperFire.js";
import { RainstormDefinition } from "./effects/rainstorm.js";
import { SpotlightDefinition } from "./effects/spotlight.js";
import { StarryNightDefinition } from "./effects/starryNight.js";
import { StarsCleanDefinition } from "./effects/starsClean.js";
import { ToasterDefinition } from "./effects/toasterSaver.js";
import { WarpDefinition } from "./effects/warp.js";
import { WormsDefinition } from "./effects/worms.js";

export const effectDefinitions: readonly EffectDefinition[] = [
  BouncingBallDefinition,
  GlobeDefinition,
  LogoDefinition,
  WarpDefinition,
  ToasterDefinition,
  FishDefinition,
  MatrixDefinition,
  HardRainDefinition,
  RainstormDefinition,
  PaperFireDefinition,
  CityscapeDefinition,
  LifeformsDefinition,
  ClassicLifeformsDefinition,
  FadeoutDefinition,
  SpotlightDefinition,
  WormsDefinition,
  MessagesDefinition,
  QuoteMessagesDefinition,
  StarryNightDefinition,
  StarsCleanDefinition,
];

export const findEffectDefinition = (type: string): EffectDefinition | null =>
  effectDefinitions.find((definition) => definition.type === type) ?? null;
