import { Module, type OnModuleInit } from '@nestjs/common';
import { LlmConfigService } from './llm-config.service.js';
import { PromptBuilderService } from './prompts/prompt-builder.service.js';
import { LlmCallerService } from './llm-caller.service.js';
import { LlmDecisionMakerService } from './llm-decision-maker.service.js';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { LlmSettingsController } from './llm-settings.controller.js';
import { MockProvider } from './providers/mock.provider.js';
import { OpenAIProvider } from './providers/openai.provider.js';
import { GeminiProvider } from './providers/gemini.provider.js';

@Module({
  controllers: [LlmSettingsController],
  providers: [
    LlmConfigService,
    PromptBuilderService,
    LlmCallerService,
    LlmDecisionMakerService,
    LlmProviderRegistryService,
  ],
  exports: [LlmConfigService, PromptBuilderService, LlmDecisionMakerService],
})
export class LlmModule implements OnModuleInit {
  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
  ) {}

  onModuleInit(): void {
    this.registry.register(new MockProvider());
    this.registry.register(new OpenAIProvider(this.configService));
    this.registry.register(new GeminiProvider(this.configService));
  }
}
