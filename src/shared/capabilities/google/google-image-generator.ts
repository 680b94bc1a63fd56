import { GenerateImagesResponse, GoogleGenAI, PersonGeneration } from "@google/genai";
import { ImageAsset } from "../../types/index.js";
import { PermanentError, PolicyRejection } from "../../utils/errors.js";
import { CapabilityOptions, ImageGenerationParams, ImageGenerator } from "../capability-types.js";
import { toCapabilityError } from "./provider-errors.js";
import { buildImagePrompt } from "./style-presets.js";

/**
 * Imagen text-to-image through @google/genai.
 */
export class GoogleImageGenerator implements ImageGenerator {

    constructor(
        private readonly client: GoogleGenAI,
        private readonly model: string,
    ) { }

    async generateImage(prompt: string, params: ImageGenerationParams, options: CapabilityOptions = {}): Promise<ImageAsset> {
        const finalPrompt = buildImagePrompt(prompt, params.stylePreset);
        console.log(`   Generating image with prompt: ${finalPrompt.substring(0, 50)}...`);

        let response: GenerateImagesResponse;
        try {
            response = await this.client.models.generateImages({
                model: this.model,
                prompt: finalPrompt,
                config: {
                    numberOfImages: 1,
                    aspectRatio: params.aspectRatio ?? "16:9",
                    outputMimeType: "image/png",
                    includeRaiReason: true,
                    personGeneration: PersonGeneration.ALLOW_ADULT,
                    abortSignal: options.signal,
                },
            });
        } catch (error) {
            throw toCapabilityError(error, "Image generation failed");
        }

        const [ generated ] = response.generatedImages ?? [];
        if (generated?.raiFilteredReason) {
            throw new PolicyRejection(generated.raiFilteredReason);
        }

        const imageBytes = generated?.image?.imageBytes;
        if (!imageBytes) {
            throw new PermanentError("Image generation completed but returned no image data");
        }

        return {
            bytes: Buffer.from(imageBytes, "base64"),
            mimeType: generated?.image?.mimeType ?? "image/png",
            model: this.model,
        };
    }
}
