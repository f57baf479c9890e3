import fs from 'fs';
import { AvatarDefaults } from '../../config';
import { InvalidInputError } from '../../domain/errors';
import { AvatarBackground, IAvatarVideoClient } from '../../domain/ports/IAvatarVideoClient';
import { sniffImageContentType } from '../media/contentTypes';

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;
const REMOTE_URL = /^https?:\/\//i;

export interface BackgroundSpec {
    /** "newsroom", a hex color, or an image URL */
    background?: string;
    /** Local path or URL of an image; takes precedence over `background` */
    backgroundImage?: string;
}

/**
 * Turns the background options of a request into a HeyGen background,
 * uploading local images as assets on the way.
 */
export class BackgroundResolver {
    constructor(
        private readonly client: Pick<IAvatarVideoClient, 'uploadAsset'>,
        private readonly defaults: AvatarDefaults
    ) { }

    async resolve(options: BackgroundSpec): Promise<AvatarBackground> {
        if (options.backgroundImage) {
            return this.resolveImage(options.backgroundImage);
        }

        const background = options.background?.trim();
        if (background && REMOTE_URL.test(background)) {
            return { type: 'image', url: background };
        }
        return this.resolveColor(background);
    }

    /**
     * Flat color only: the newsroom default or an explicit hex value.
     */
    resolveColor(background?: string): AvatarBackground {
        const value = background?.trim();
        if (!value || value.toLowerCase() === this.defaults.background) {
            return { type: 'color', value: this.defaults.backgroundColor };
        }
        if (HEX_COLOR.test(value)) {
            return { type: 'color', value };
        }
        throw new InvalidInputError(`Unrecognized background: ${value}`);
    }

    private async resolveImage(image: string): Promise<AvatarBackground> {
        if (REMOTE_URL.test(image)) {
            return { type: 'image', url: image };
        }
        if (!fs.existsSync(image)) {
            throw new InvalidInputError(`Background image not found: ${image}`);
        }

        const contentType = await sniffImageContentType(image);
        const asset = await this.client.uploadAsset(image, contentType);
        return { type: 'image', imageAssetId: asset.id };
    }
}
