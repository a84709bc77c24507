import { Injectable } from "@nestjs/common";

import type { ConfigDocument } from "./schemas";
import { getRuntimeConfig } from "./runtime-config";

@Injectable()
export class RuntimeConfigService {
  private readonly document: ConfigDocument;

  constructor() {
    const config = getRuntimeConfig();
    if (!config) {
      throw new Error("Runtime configuration not initialised");
    }
    this.document = config;
  }

  /** Deep copy; callers may mutate it freely. */
  getDocument(): ConfigDocument {
    return structuredClone(this.document);
  }

  getDocumentRef(): ConfigDocument {
    return this.document;
  }
}
