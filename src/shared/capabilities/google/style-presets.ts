const STYLE_PHRASES: Record<string, string> = {
    cinematic: "cinematic film still, anamorphic lens, dramatic composition",
    photorealistic: "photorealistic, natural lighting, shot on 35mm",
    anime: "anime style, cel shading, vibrant colors",
    noir: "film noir, high contrast black and white, hard shadows",
    watercolor: "watercolor painting, soft washes, paper texture",
    documentary: "documentary footage, handheld camera, available light",
    fantasy: "epic fantasy art, ethereal atmosphere, painterly detail",
    "3d_render": "3D render, global illumination, physically based materials",
};

export const IMAGE_QUALITY_BOOSTER = ", stunning quality, highly detailed, 8k resolution, sharp focus, professional image, cinematic lighting";

export function stylePhrase(preset: string): string {
    const key = preset.trim().toLowerCase();
    return STYLE_PHRASES[ key ] ?? `${key} style`;
}

export function buildImagePrompt(prompt: string, preset: string): string {
    return `${prompt.trim()}, ${stylePhrase(preset)}${IMAGE_QUALITY_BOOSTER}`;
}
