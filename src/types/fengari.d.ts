/**
 * Type declarations for the subset of the fengari Lua VM API used by this package.
 * fengari ships no typings of its own.
 */

declare module 'fengari' {
  namespace fengari {
    /** Lua strings are byte arrays */
    type luastring = Uint8Array;

    /** Opaque interpreter state (one per thread) */
    class lua_State {
      private constructor();
    }

    type lua_JSFunction = (L: lua_State) => number;
    type lua_Reader = (L: lua_State, data: unknown) => luastring | null;

    namespace lua {
      const LUA_OK: number;

      const LUA_TNONE: number;
      const LUA_TNIL: number;
      const LUA_TBOOLEAN: number;
      const LUA_TNUMBER: number;
      const LUA_TSTRING: number;
      const LUA_TTABLE: number;
      const LUA_TFUNCTION: number;

      const LUA_MULTRET: number;
      const LUA_REGISTRYINDEX: number;

      function lua_close(L: lua_State): void;

      function lua_gettop(L: lua_State): number;
      function lua_settop(L: lua_State, idx: number): void;
      function lua_pop(L: lua_State, n: number): void;
      function lua_pushvalue(L: lua_State, idx: number): void;

      function lua_pushnil(L: lua_State): void;
      function lua_pushboolean(L: lua_State, b: boolean): void;
      function lua_pushinteger(L: lua_State, n: number): void;
      function lua_pushnumber(L: lua_State, n: number): void;
      function lua_pushlstring(L: lua_State, s: luastring, len: number): luastring;
      function lua_pushjsfunction(L: lua_State, fn: lua_JSFunction): void;
      function lua_pushglobaltable(L: lua_State): void;

      function lua_type(L: lua_State, idx: number): number;
      function lua_typename(L: lua_State, t: number): luastring;
      function lua_toboolean(L: lua_State, idx: number): boolean;
      function lua_tonumber(L: lua_State, idx: number): number;
      function lua_tolstring(L: lua_State, idx: number): luastring | null;
      function lua_isinteger(L: lua_State, idx: number): boolean;
      function lua_topointer(L: lua_State, idx: number): unknown;
      function lua_rawlen(L: lua_State, idx: number): number;

      function lua_createtable(L: lua_State, narr: number, nrec: number): void;
      function lua_rawget(L: lua_State, idx: number): number;
      function lua_rawset(L: lua_State, idx: number): void;
      function lua_rawgeti(L: lua_State, idx: number, n: number): number;
      function lua_rawseti(L: lua_State, idx: number, n: number): void;
      function lua_next(L: lua_State, idx: number): number;
      function lua_getmetatable(L: lua_State, idx: number): boolean | number;
      function lua_setmetatable(L: lua_State, idx: number): void;

      function lua_getglobal(L: lua_State, name: luastring): number;
      function lua_setglobal(L: lua_State, name: luastring): void;

      function lua_pcall(
        L: lua_State,
        nargs: number,
        nresults: number,
        msgh: number
      ): number;
      function lua_error(L: lua_State): never;
      function lua_load(
        L: lua_State,
        reader: lua_Reader,
        data: unknown,
        chunkname: luastring,
        mode: luastring | null
      ): number;
    }

    namespace lauxlib {
      function luaL_newstate(): lua_State;
      function luaL_loadbuffer(
        L: lua_State,
        buff: luastring,
        size: number,
        name: luastring
      ): number;
      function luaL_tolstring(L: lua_State, idx: number): luastring;
      function luaL_requiref(
        L: lua_State,
        modname: luastring,
        openf: lua_JSFunction,
        glb: boolean
      ): void;
    }

    namespace lualib {
      function luaL_openlibs(L: lua_State): void;
      const luaopen_base: lua_JSFunction;
      const luaopen_coroutine: lua_JSFunction;
      const luaopen_table: lua_JSFunction;
      const luaopen_os: lua_JSFunction;
      const luaopen_string: lua_JSFunction;
      const luaopen_utf8: lua_JSFunction;
      const luaopen_math: lua_JSFunction;
      const luaopen_debug: lua_JSFunction;
      const luaopen_package: lua_JSFunction;
    }

    function to_luastring(str: string, cache?: boolean): luastring;
    function to_jsstring(
      value: luastring,
      from?: number,
      to?: number,
      replacement_char?: boolean
    ): string;
  }

  export = fengari;
}
