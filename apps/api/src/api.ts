import { HttpApi } from "@effect/platform";
import { AccountsGroup } from "./accounts/api.js";

export class Api extends HttpApi.make("Api").add(AccountsGroup) {}
