import { latexToUnicode } from '../notation/latex.js';

/** Upper bound on `=` signs tried for the long-string delimiter. */
const MAX_LEVEL = 11;

/**
 * Smallest long-bracket level whose closing bracket (`]]`, `]=]`, …) does
 * not occur in `text`. Returns the `=` run to put between the brackets.
 */
export function longStringLevel(text: string): string {
  let eq = '';
  while (text.includes(`]${eq}]`) && eq.length < MAX_LEVEL) eq += '=';
  return eq;
}

/**
 * Lua program that shows `text` as a scrollable note: word-wrapped to the
 * window width, UP/DOWN scroll by one line, ENTER jumps back to the top.
 * LaTeX-style notation in `text` is rendered to Unicode first.
 */
export function textToLuaScript(text: string): string {
  const body = latexToUnicode(text);
  const eq   = longStringLevel(body);

  return String.raw`-- Text Note (generated by tnspack)
local text = [${eq}[${body}]${eq}]

local FONT_SIZE = 11
local LINE_HEIGHT = 15
local MARGIN_X = 4
local MARGIN_TOP = 20
local scroll = 0
local max_scroll = 0
local wrapped_lines = {}

-- Wrap text to fit screen width
function wrap_text(gc, txt, max_width)
    wrapped_lines = {}
    for line in (txt .. "\n"):gmatch("([^\r\n]*)\r?\n") do
        if line == "" then
            table.insert(wrapped_lines, "")
        else
            local current = ""
            for word in line:gmatch("%S+") do
                local test = current == "" and word or (current .. " " .. word)
                if gc:getStringWidth(test) > max_width then
                    if current ~= "" then
                        table.insert(wrapped_lines, current)
                    end
                    -- Break words wider than the window
                    if gc:getStringWidth(word) > max_width then
                        local chars = ""
                        for c in word:gmatch(".") do
                            if gc:getStringWidth(chars .. c) > max_width then
                                table.insert(wrapped_lines, chars)
                                chars = c
                            else
                                chars = chars .. c
                            end
                        end
                        current = chars
                    else
                        current = word
                    end
                else
                    current = test
                end
            end
            if current ~= "" then
                table.insert(wrapped_lines, current)
            end
        end
    end
end

function on.paint(gc)
    gc:setFont("sansserif", "r", FONT_SIZE)
    local w, h = platform.window:width(), platform.window:height()

    if #wrapped_lines == 0 then
        wrap_text(gc, text, w - MARGIN_X * 2)
    end

    local y = MARGIN_TOP - scroll
    for _, line in ipairs(wrapped_lines) do
        if y + LINE_HEIGHT > 0 and y < h then
            gc:drawString(line, MARGIN_X, y)
        end
        y = y + LINE_HEIGHT
    end

    max_scroll = math.max(0, #wrapped_lines * LINE_HEIGHT - h + MARGIN_TOP + 10)
end

function on.arrowKey(key)
    if key == "up" then
        scroll = math.max(0, scroll - LINE_HEIGHT)
    elseif key == "down" then
        scroll = math.min(max_scroll, scroll + LINE_HEIGHT)
    end
    platform.window:invalidate()
end

function on.enterKey()
    scroll = 0
    platform.window:invalidate()
end

function on.resize()
    wrapped_lines = {}
    platform.window:invalidate()
end

platform.window:invalidate()
`;
}
