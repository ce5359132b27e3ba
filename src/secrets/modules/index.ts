import { cookieSessionModule } from "./cookie-session";
import { djangoModule } from "./django";
import { expressSessionModule } from "./express-session";
import { flaskModule } from "./flask";
import { jwtModule } from "./jwt";
import { laravelModule } from "./laravel";
import { railsModule } from "./rails";
import type { CryptoModule } from "./types";

/**
 * All detection modules, in registration order
 *
 * Order breaks ties when more than one module recognises a value.
 * New modules can be added here to extend detection.
 */
export const defaultModules: readonly CryptoModule[] = [
  jwtModule,
  flaskModule,
  djangoModule,
  expressSessionModule,
  cookieSessionModule,
  laravelModule,
  railsModule,
];

export type {
  CarvedToken,
  CheckHints,
  CryptoModule,
  DetectionResult,
  HashcatCandidate,
  HashcatTemplate,
  ProductDescriptor,
  ProductIdentified,
  ScanResponse,
  SecretEntry,
  SecretFound,
  SecretMatch,
  SecretOrigin,
  TokenDetails,
} from "./types";
