import { errorHandler, notFound } from "./errorHandler";
import { perUserIpLimiter } from "./rateLimiters";
import { validateZod } from "./validateZod";

export { errorHandler, notFound, perUserIpLimiter, validateZod };
