/**
 * Static document templates. Each carries a single `{0}` placeholder that
 * receives the joined option tokens.
 */

import { TWITCH_CLIP_EMBED_URL, TWITCH_EMBED_SCRIPT_URL } from "./EmbedKeys";

export const INITIALIZATION_PLACEHOLDER = "{0}";

export const CLIP_PLACEHOLDER = "<slug>";

/**
 * Full player document. `performPlayerCommand` queues commands until the
 * embed reports VIDEO_READY, then runs them in order; afterwards it runs
 * them immediately.
 */
export const STREAM_PLAYER_TEMPLATE = `<meta name="viewport" content="initial-scale=1.0" />
<html>
    <body>
        <div id='twitch-embed'></div>
        <script src='${TWITCH_EMBED_SCRIPT_URL}'></script><script type='text/javascript'>
            var playerCommandsToExecute = [];
            var player = null;

            const embed = new Twitch.Embed('twitch-embed', {
                width: '100%',
                height: '95%',
                playsinline: true,
                {0}
            });

            embed.addEventListener(Twitch.Embed.VIDEO_READY, () => {
                player = embed.getPlayer();

                playerCommandsToExecute.forEach(function(playerCommand) {
                    playerCommand();
                });
                playerCommandsToExecute = [];
            });

            function performPlayerCommand(command) {
                if (player == null) {
                    playerCommandsToExecute.push(command);
                } else {
                    command();
                }
            }
        </script>
    </body>
</html>
`;

export const CLIP_PLAYER_TEMPLATE = `<iframe
    src="${TWITCH_CLIP_EMBED_URL}?clip=<slug>"
    height="98%"
    width="100%"
    frameborder="0"
    margin="0"
    padding="0"
    {0}>
</iframe>
`;
